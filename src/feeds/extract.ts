/**
 * Newscast — Field Extractors
 *
 * Pulls the image URL and publication date out of a feed entry.
 * Each field has an ordered list of strategies; the first one that
 * yields a value wins and nothing is merged.
 */

import type { FeedEntry, MediaRef } from '../types';

type Strategy<T> = (entry: FeedEntry) => T | undefined;

function firstMatch<T>(strategies: readonly Strategy<T>[], entry: FeedEntry): T | undefined {
  for (const strategy of strategies) {
    const value = strategy(entry);
    if (value !== undefined) return value;
  }
  return undefined;
}

// ============================================================
// IMAGE
// ============================================================

const IMG_SRC_PATTERN = /<img[^>]+src=["']([^"']+)["']/i;

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function isImage(media: MediaRef): boolean {
  return (media.type ?? '').includes('image');
}

const IMAGE_STRATEGIES: readonly Strategy<string>[] = [
  entry => nonEmpty(entry.mediaContent?.find(isImage)?.url),
  entry => nonEmpty(entry.mediaThumbnail?.[0]?.url),
  entry => nonEmpty(entry.enclosures?.find(isImage)?.url),
  entry => {
    for (const html of [entry.summary, entry.description]) {
      const match = html ? IMG_SRC_PATTERN.exec(html) : null;
      if (match) return match[1];
    }
    return undefined;
  },
];

/**
 * Image URL for an entry, or "" when no strategy finds one.
 */
export function extractImage(entry: FeedEntry): string {
  return firstMatch(IMAGE_STRATEGIES, entry) ?? '';
}

// ============================================================
// DATE
// ============================================================

/**
 * Format a timestamp as UTC YYYY-MM-DD.
 * Unparseable input makes toISOString throw, which reads as "absent".
 */
export function formatDate(value: string | Date): string | undefined {
  try {
    return new Date(value).toISOString().slice(0, 10);
  } catch {
    return undefined;
  }
}

const DATE_STRATEGIES: readonly Strategy<string>[] = [
  entry => (entry.published ? formatDate(entry.published) : undefined),
  entry => (entry.updated ? formatDate(entry.updated) : undefined),
];

/**
 * Publication date of an entry: published, then updated, then `now`.
 */
export function extractDate(entry: FeedEntry, now: Date = new Date()): string {
  return firstMatch(DATE_STRATEGIES, entry) ?? now.toISOString().slice(0, 10);
}
