/**
 * Newscast — Synthesis Runner
 *
 * Voices every stored record and re-persists the store with audio paths.
 * A record whose audio file already exists is never re-synthesized.
 * Failures stay with their record: its audio remains empty and the
 * run moves on.
 */

import pLimit from 'p-limit';
import type { PodcastRecord } from '../types';
import type { AppConfig } from '../config';
import { logger } from '../lib/logger';
import { SynthesisError, getErrorMessage } from '../lib/errors';
import { recordText, type PodcastStore, type StoreStatus } from '../storage/podcast-store';
import type { SpeechSynthesizer } from './synthesizer';

export type SynthesisRunConfig = Pick<AppConfig['synthesis'], 'voice' | 'concurrency'>;

type RecordOutcome = 'synthesized' | 'existing' | 'failed';

export interface SynthesisReport {
  /** True when the store had nothing to voice and the run stopped early */
  aborted: boolean;
  storeStatus: StoreStatus;
  total: number;
  synthesized: number;
  existing: number;
  failed: number;
  records: PodcastRecord[];
}

async function resolveText(store: PodcastStore, record: PodcastRecord): Promise<string> {
  const stored = await store.readText(record.id);
  const text = (stored ?? recordText(record)).trim();
  if (!text) {
    throw new SynthesisError('Empty text', record.id);
  }
  return text;
}

async function synthesizeRecord(
  store: PodcastStore,
  synthesizer: SpeechSynthesizer,
  record: PodcastRecord,
  config: SynthesisRunConfig
): Promise<{ outcome: RecordOutcome; record: PodcastRecord }> {
  const log = logger.child({ recordId: record.id });

  try {
    if (await store.hasAudio(record.id)) {
      log.info('Audio already exists', { audio: store.audioPath(record.id) });
      return { outcome: 'existing', record: { ...record, audio: store.audioPath(record.id) } };
    }

    const text = await resolveText(store, record);
    log.info('Synthesizing', { title: record.title.slice(0, 50), chars: text.length });

    let audio: Uint8Array;
    try {
      audio = await synthesizer.synthesize(text, { voice: config.voice });
    } catch (error) {
      throw new SynthesisError(getErrorMessage(error), record.id, { cause: error });
    }

    const audioPath = await store.writeAudio(record.id, audio);
    log.info('Audio saved', { audio: audioPath, sizeKb: Number((audio.byteLength / 1024).toFixed(1)) });

    return { outcome: 'synthesized', record: { ...record, audio: audioPath } };
  } catch (error) {
    log.error('Synthesis failed', { error: getErrorMessage(error) });
    return { outcome: 'failed', record };
  }
}

/**
 * Voice every record in the store.
 */
export async function synthesizeAll(
  store: PodcastStore,
  synthesizer: SpeechSynthesizer,
  config: SynthesisRunConfig
): Promise<SynthesisReport> {
  const loaded = await store.load();

  if (loaded.records.length === 0) {
    logger.error('No records to synthesize; stopping', { status: loaded.status });
    return {
      aborted: true,
      storeStatus: loaded.status,
      total: 0,
      synthesized: 0,
      existing: 0,
      failed: 0,
      records: [],
    };
  }

  const limit = pLimit(config.concurrency);
  const results = await Promise.all(
    loaded.records.map(record => limit(() => synthesizeRecord(store, synthesizer, record, config)))
  );

  const records = results.map(result => result.record);
  await store.save(records);

  const count = (outcome: RecordOutcome) => results.filter(r => r.outcome === outcome).length;
  const report: SynthesisReport = {
    aborted: false,
    storeStatus: loaded.status,
    total: records.length,
    synthesized: count('synthesized'),
    existing: count('existing'),
    failed: count('failed'),
    records,
  };

  logger.info('Synthesis completed', {
    total: report.total,
    synthesized: report.synthesized,
    existing: report.existing,
    failed: report.failed,
  });

  return report;
}
