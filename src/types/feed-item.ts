/**
 * Newscast — Feed Item Types
 *
 * Feed source configuration, the raw entry shape read from a feed,
 * and the normalized news item every source produces.
 */

import { z } from 'zod';

// ============================================================
// FEED SOURCE CONFIGURATION
// ============================================================

export const FeedSourceDefinitionSchema = z.object({
  /** Display name, copied onto every item as `source` */
  name: z.string().min(1),
  url: z.string().url(),
  /** Lower = preferred. Informational only; never used for ordering. */
  priority: z.number().int(),
});
export type FeedSourceDefinition = z.infer<typeof FeedSourceDefinitionSchema>;

// Array-index keys ("0", "2024") are enumerated before all others,
// so a category named like one would not keep its place in the table.
const ARRAY_INDEX_KEY = /^(0|[1-9]\d*)$/;

const CategoryNameSchema = z
  .string()
  .min(1)
  .refine(name => !ARRAY_INDEX_KEY.test(name), {
    message: 'Category name must not be a plain integer',
  });

/**
 * Category name -> ordered sources. Key order is category order.
 */
export const FeedTableSchema = z
  .record(CategoryNameSchema, z.array(FeedSourceDefinitionSchema))
  .refine(table => Object.keys(table).length > 0, {
    message: 'Feed table must define at least one category',
  });
export type FeedTable = Readonly<Record<string, readonly FeedSourceDefinition[]>>;

// ============================================================
// RAW ENTRIES
// ============================================================

export interface MediaRef {
  url?: string;
  type?: string;
}

/**
 * One entry as read from a feed, before cleaning.
 * Every field is optional: RSS and Atom disagree on most of them.
 */
export interface FeedEntry {
  title?: string;
  link?: string;
  /** Raw HTML summary (RSS description / Atom summary) */
  summary?: string;
  /** Alternate raw description field */
  description?: string;
  published?: string;
  updated?: string;
  mediaContent?: MediaRef[];
  mediaThumbnail?: MediaRef[];
  enclosures?: MediaRef[];
}

// ============================================================
// NORMALIZED ITEM
// ============================================================

export interface NewsItem {
  title: string;
  description: string;
  link: string;
  image: string;
  /** YYYY-MM-DD */
  date: string;
  source: string;
}
