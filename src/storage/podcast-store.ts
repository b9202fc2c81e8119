/**
 * Newscast — Podcast Store
 *
 * File-backed persistence for one run's records:
 *
 *   <dataDir>/podcasts.json           ordered record set
 *   <dataDir>/texts/podcast_<id>.txt  text handed to synthesis
 *   <dataDir>/audio/podcast_<id>.mp3  synthesized audio
 *
 * Everything is keyed by record id.
 */

import { mkdir, readFile, rename, stat, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { PodcastStoreSchema, type PodcastRecord } from '../types';
import { logger } from '../lib/logger';
import { getErrorMessage } from '../lib/errors';

export const RECORDS_FILE = 'podcasts.json';
export const TEXTS_DIR = 'texts';
export const AUDIO_DIR = 'audio';

export type StoreStatus = 'ok' | 'missing' | 'invalid';

export interface StoreLoadResult {
  records: PodcastRecord[];
  /** 'missing' and 'invalid' are recoverable: records is empty */
  status: StoreStatus;
  error?: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Text spoken for a record.
 */
export function recordText(record: Pick<PodcastRecord, 'title' | 'description'>): string {
  return `${record.title}. ${record.description}`;
}

/**
 * Write through a temp file and rename, so readers never see a partial file.
 */
async function writeAtomic(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  await writeFile(tempPath, data);
  await rename(tempPath, path);
}

export class PodcastStore {
  readonly recordsFile: string;
  readonly textsDir: string;
  readonly audioDir: string;

  constructor(readonly dataDir: string) {
    this.recordsFile = join(dataDir, RECORDS_FILE);
    this.textsDir = join(dataDir, TEXTS_DIR);
    this.audioDir = join(dataDir, AUDIO_DIR);
  }

  // ============================================================
  // RECORDS
  // ============================================================

  /**
   * Replace the stored record set.
   */
  async save(records: PodcastRecord[]): Promise<void> {
    await writeAtomic(this.recordsFile, JSON.stringify(records, null, 2) + '\n');
    logger.info('Records saved', { file: this.recordsFile, records: records.length });
  }

  /**
   * Load the stored record set. Never throws: a missing or corrupt
   * file is logged and reported through `status`.
   */
  async load(): Promise<StoreLoadResult> {
    let raw: string;
    try {
      raw = await readFile(this.recordsFile, 'utf-8');
    } catch (error) {
      const message = getErrorMessage(error);
      if (isMissingFile(error)) {
        logger.error('Record store not found; run the aggregation first', { file: this.recordsFile });
        return { records: [], status: 'missing', error: message };
      }
      logger.error('Record store unreadable', { file: this.recordsFile, error: message });
      return { records: [], status: 'invalid', error: message };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('Record store is not valid JSON', { file: this.recordsFile, error: message });
      return { records: [], status: 'invalid', error: message };
    }

    const parsed = PodcastStoreSchema.safeParse(json);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      logger.error('Record store failed validation', { file: this.recordsFile, error: message });
      return { records: [], status: 'invalid', error: message };
    }

    logger.info('Records loaded', { file: this.recordsFile, records: parsed.data.length });
    return { records: parsed.data, status: 'ok' };
  }

  // ============================================================
  // TEXT BLOBS
  // ============================================================

  textFile(id: number): string {
    return join(this.textsDir, `podcast_${id}.txt`);
  }

  /**
   * Write one `title. description` blob per record.
   */
  async saveTexts(records: PodcastRecord[]): Promise<void> {
    await mkdir(this.textsDir, { recursive: true });
    for (const record of records) {
      await writeFile(this.textFile(record.id), recordText(record), 'utf-8');
    }
    logger.info('Texts for synthesis saved', { dir: this.textsDir, count: records.length });
  }

  /**
   * Stored text for a record, or null when no blob exists.
   */
  async readText(id: number): Promise<string | null> {
    try {
      return await readFile(this.textFile(id), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  // ============================================================
  // AUDIO
  // ============================================================

  /**
   * Path stored in `record.audio`, relative to the data directory.
   */
  audioPath(id: number): string {
    return `${AUDIO_DIR}/podcast_${id}.mp3`;
  }

  audioFile(id: number): string {
    return join(this.dataDir, this.audioPath(id));
  }

  async hasAudio(id: number): Promise<boolean> {
    try {
      return (await stat(this.audioFile(id))).isFile();
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  /**
   * Store audio for a record and return its relative path.
   */
  async writeAudio(id: number, data: Uint8Array): Promise<string> {
    await writeAtomic(this.audioFile(id), data);
    return this.audioPath(id);
  }
}
