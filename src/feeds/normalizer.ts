/**
 * Newscast — Feed Normalizer
 *
 * Converts raw feed entries into the unified NewsItem format.
 */

import type { FeedEntry, NewsItem } from '../types';
import { cleanMarkup, truncate, DEFAULT_TRUNCATE_LENGTH } from '../lib/text';
import { extractDate, extractImage } from './extract';

export interface NormalizeOptions {
  descriptionMaxLength?: number;
  /** Fallback date for entries without a usable timestamp */
  now?: Date;
}

/**
 * Normalize one entry. Returns null when the title is empty after cleaning.
 */
export function normalizeEntry(
  entry: FeedEntry,
  sourceName: string,
  options: NormalizeOptions = {}
): NewsItem | null {
  const title = cleanMarkup(entry.title);
  if (!title) return null;

  const description = truncate(
    cleanMarkup(entry.summary ?? entry.description),
    options.descriptionMaxLength ?? DEFAULT_TRUNCATE_LENGTH
  );

  return {
    title,
    description,
    link: entry.link ?? '',
    image: extractImage(entry),
    date: extractDate(entry, options.now),
    source: sourceName,
  };
}

/**
 * Normalize a batch, dropping untitled entries and keeping feed order.
 */
export function normalizeEntries(
  entries: FeedEntry[],
  sourceName: string,
  options: NormalizeOptions = {}
): NewsItem[] {
  const items: NewsItem[] = [];
  for (const entry of entries) {
    const item = normalizeEntry(entry, sourceName, options);
    if (item) items.push(item);
  }
  return items;
}
