/**
 * Tests for the file-backed podcast store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PodcastStore, recordText } from '../../src/storage/podcast-store';
import type { PodcastRecord } from '../../src/types';

const records: PodcastRecord[] = [
  {
    id: 1,
    title: 'Финал «Кубка»',
    category: 'Турниры',
    date: '2024-01-10',
    image: 'https://cdn.example.com/1.jpg',
    audio: '',
    description: 'Команды сыграют в субботу.',
    source: 'Example Feed',
    link: 'https://news.example.com/1',
  },
  {
    id: 2,
    title: 'Patch 1.2',
    category: 'Релизы',
    date: '2024-01-09',
    image: '',
    audio: '',
    description: '',
    source: 'Example Feed',
    link: '',
  },
];

describe('PodcastStore', () => {
  let dataDir: string;
  let store: PodcastStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'newscast-store-'));
    store = new PodcastStore(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  describe('save / load', () => {
    it('should round-trip records including empty fields', async () => {
      await store.save(records);

      await expect(store.load()).resolves.toEqual({ records, status: 'ok' });
    });

    it('should write non-ASCII text verbatim', async () => {
      await store.save(records);

      const raw = await readFile(join(dataDir, 'podcasts.json'), 'utf-8');
      expect(raw).toContain('"title": "Финал «Кубка»"');
    });

    it('should replace previous content and leave no temp files', async () => {
      await store.save(records);
      await store.save([records[1]]);

      const loaded = await store.load();
      expect(loaded.records.map(r => r.id)).toEqual([2]);
      expect(await readdir(dataDir)).toEqual(['podcasts.json']);
    });

    it('should report a missing store', async () => {
      const loaded = await store.load();

      expect(loaded.records).toEqual([]);
      expect(loaded.status).toBe('missing');
    });

    it('should report malformed JSON', async () => {
      await writeFile(join(dataDir, 'podcasts.json'), '[{"id": 1,', 'utf-8');

      const loaded = await store.load();

      expect(loaded.records).toEqual([]);
      expect(loaded.status).toBe('invalid');
    });

    it('should report records that fail validation', async () => {
      await writeFile(join(dataDir, 'podcasts.json'), JSON.stringify([{ id: 'one', title: 'x' }]), 'utf-8');

      const loaded = await store.load();

      expect(loaded.records).toEqual([]);
      expect(loaded.status).toBe('invalid');
      expect(loaded.error).toContain('0.id');
    });
  });

  describe('saveTexts', () => {
    it('should write one title-plus-description blob per id', async () => {
      await store.saveTexts(records);

      await expect(readFile(join(dataDir, 'texts', 'podcast_1.txt'), 'utf-8')).resolves.toBe(
        'Финал «Кубка». Команды сыграют в субботу.'
      );
      await expect(store.readText(2)).resolves.toBe('Patch 1.2. ');
    });

    it('should return null for a record without a blob', async () => {
      await expect(store.readText(99)).resolves.toBeNull();
    });
  });

  describe('audio', () => {
    it('should derive paths from the record id', () => {
      expect(store.audioPath(7)).toBe('audio/podcast_7.mp3');
      expect(store.audioFile(7)).toBe(join(dataDir, 'audio', 'podcast_7.mp3'));
    });

    it('should write audio and report it as present', async () => {
      await expect(store.hasAudio(3)).resolves.toBe(false);

      const path = await store.writeAudio(3, new Uint8Array([1, 2, 3]));

      expect(path).toBe('audio/podcast_3.mp3');
      await expect(store.hasAudio(3)).resolves.toBe(true);
      expect([...(await readFile(store.audioFile(3)))]).toEqual([1, 2, 3]);
    });

    it('should not treat a directory as audio', async () => {
      await mkdir(store.audioFile(4), { recursive: true });

      await expect(store.hasAudio(4)).resolves.toBe(false);
    });
  });

  describe('recordText', () => {
    it('should join title and description', () => {
      expect(recordText({ title: 'A', description: 'B' })).toBe('A. B');
    });
  });
});
