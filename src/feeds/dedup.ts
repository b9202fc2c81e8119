/**
 * Newscast — Feed Deduplication
 *
 * Collapses near-duplicate items within one category by fuzzy title:
 * case, surrounding whitespace and punctuation do not make two
 * titles different. The first item seen wins.
 */

import type { NewsItem } from '../types';

/**
 * Result of deduplication process.
 */
export interface DedupResult {
  items: NewsItem[];
  duplicateCount: number;
  totalProcessed: number;
}

// Anything that is not a letter, digit, underscore or whitespace
const PUNCTUATION_PATTERN = /[^\p{L}\p{N}_\s]/gu;

/**
 * Normalize a title for comparison.
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().trim().replace(PUNCTUATION_PATTERN, '');
}

/**
 * Deduplicate with counts for logging.
 */
export function deduplicateWithStats(items: NewsItem[]): DedupResult {
  const seenTitles = new Set<string>();
  const unique: NewsItem[] = [];

  for (const item of items) {
    const normalized = normalizeTitle(item.title);
    if (seenTitles.has(normalized)) continue;

    seenTitles.add(normalized);
    unique.push(item);
  }

  return {
    items: unique,
    duplicateCount: items.length - unique.length,
    totalProcessed: items.length,
  };
}

/**
 * Keep the first item for each normalized title, preserving order.
 */
export function deduplicate(items: NewsItem[]): NewsItem[] {
  return deduplicateWithStats(items).items;
}
