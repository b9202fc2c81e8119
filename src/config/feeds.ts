/**
 * Newscast — Feed Table
 *
 * Built-in category -> source mapping, and loading of a replacement
 * table from JSON. Category order is key order.
 */

import { readFileSync } from 'fs';
import { FeedTableSchema, type FeedSourceDefinition, type FeedTable } from '../types';
import { ConfigError, getErrorMessage } from '../lib/errors';

export const DEFAULT_FEEDS: FeedTable = {
  'Турниры': [
    { name: 'Cyber.Sports.ru', url: 'https://cyber.sports.ru/rss/main.xml', priority: 1 },
    { name: 'GoHa.ru - Киберспорт', url: 'https://www.goha.ru/rss/:Киберспорт', priority: 2 },
  ],
  'Релизы': [
    { name: 'StopGame - Новости', url: 'https://rss.stopgame.ru/rss_news.xml', priority: 1 },
    { name: 'GoHa.ru - Общее', url: 'https://www.goha.ru/rss/', priority: 2 },
  ],
  'Обзоры': [
    { name: 'StopGame - Обзоры', url: 'https://rss.stopgame.ru/rss_review.xml', priority: 1 },
    { name: 'StopGame - Превью', url: 'https://rss.stopgame.ru/rss_preview.xml', priority: 2 },
  ],
};

/**
 * Validate an arbitrary value as a feed table.
 */
export function parseFeedTable(value: unknown): FeedTable {
  const result = FeedTableSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      'Invalid feed table',
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Read a feed table from a JSON file.
 */
export function loadFeedTable(path: string): FeedTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read feed table ${path}`, [getErrorMessage(error)]);
  }
  return parseFeedTable(raw);
}

/**
 * Deep-freeze a feed table so the config value stays immutable.
 */
export function freezeFeedTable(table: FeedTable): FeedTable {
  const frozen: Record<string, readonly FeedSourceDefinition[]> = {};
  for (const [category, sources] of Object.entries(table)) {
    frozen[category] = Object.freeze(sources.map(source => Object.freeze({ ...source })));
  }
  return Object.freeze(frozen);
}
