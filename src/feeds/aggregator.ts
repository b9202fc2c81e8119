/**
 * Newscast — Feed Aggregator
 *
 * Orchestrates one aggregation run, category by category:
 * 1. Fetch every source of the category, in configured order
 * 2. Deduplicate the merged items by fuzzy title
 * 3. Sort newest first and cap the category
 * 4. Assign run-wide ids and build podcast records
 */

import pLimit from 'p-limit';
import type { FeedTable, NewsItem, PodcastRecord } from '../types';
import type { AppConfig } from '../config';
import { logger } from '../lib/logger';
import type { FeedSource, FeedSourceFactory } from './base';
import { deduplicateWithStats } from './dedup';
import { createRssSourceFactory } from './sources';

// ============================================================
// TYPES
// ============================================================

export type AggregatorConfig = Pick<
  AppConfig,
  'feeds' | 'maxNewsPerCategory' | 'descriptionMaxLength' | 'feedTimeoutMs' | 'fetchConcurrency'
>;

export interface AggregatorOptions {
  /** How sources are built from the feed table (default: RSS) */
  sourceFactory?: FeedSourceFactory;
  /** Fallback date for undated entries */
  now?: Date;
}

export interface SourceFetchResult {
  sourceName: string;
  itemCount: number;
}

export interface CategoryResult {
  category: string;
  sources: SourceFetchResult[];
  /** Items fetched across all sources, before dedup */
  fetched: number;
  duplicates: number;
  /** Records produced for the category */
  kept: number;
}

export interface AggregatorResult {
  /** Complete ordered output of the run */
  records: PodcastRecord[];
  categories: CategoryResult[];
  durationMs: number;
  completedAt: string;
}

// ============================================================
// RANKING
// ============================================================

/**
 * Newest first, capped. Same-date items keep their merge order
 * (Array.prototype.sort is stable); YYYY-MM-DD compares correctly as text.
 */
export function rankNews(items: NewsItem[], limit: number): NewsItem[] {
  return [...items]
    .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))
    .slice(0, limit);
}

/**
 * Turn ranked items into records with ids starting at `firstId`.
 */
export function buildRecords(category: string, items: NewsItem[], firstId: number): PodcastRecord[] {
  return items.map((item, index) => ({
    id: firstId + index,
    title: item.title,
    category,
    date: item.date,
    image: item.image,
    audio: '',
    description: item.description,
    source: item.source,
    link: item.link,
  }));
}

// ============================================================
// FETCH HELPERS
// ============================================================

/**
 * Fetch every source of one category. Fetches may overlap when
 * concurrency > 1, but results come back in configured order.
 */
async function fetchCategory(
  sources: FeedSource[],
  config: AggregatorConfig,
  now: Date | undefined
): Promise<{ items: NewsItem[]; results: SourceFetchResult[] }> {
  const limit = pLimit(config.fetchConcurrency);
  const fetchOptions = {
    maxEntries: config.maxNewsPerCategory * 2,
    descriptionMaxLength: config.descriptionMaxLength,
    now,
  };

  const perSource = await Promise.all(
    sources.map(source => limit(() => source.fetch(fetchOptions)))
  );

  return {
    items: perSource.flat(),
    results: sources.map((source, index) => ({
      sourceName: source.name,
      itemCount: perSource[index]?.length ?? 0,
    })),
  };
}

function buildSources(feeds: FeedTable, factory: FeedSourceFactory): Map<string, FeedSource[]> {
  const byCategory = new Map<string, FeedSource[]>();
  for (const [category, definitions] of Object.entries(feeds)) {
    byCategory.set(category, definitions.map(factory));
  }
  return byCategory;
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Run the complete aggregation. The returned records replace any
 * previous output wholesale.
 */
export async function aggregateFeeds(
  config: AggregatorConfig,
  options: AggregatorOptions = {}
): Promise<AggregatorResult> {
  const startTime = Date.now();
  const factory = options.sourceFactory ?? createRssSourceFactory({ timeoutMs: config.feedTimeoutMs });
  const sourcesByCategory = buildSources(config.feeds, factory);

  logger.info('Starting feed aggregation', {
    categories: sourcesByCategory.size,
    maxPerCategory: config.maxNewsPerCategory,
  });

  const records: PodcastRecord[] = [];
  const categories: CategoryResult[] = [];
  let nextId = 1;

  for (const [category, sources] of sourcesByCategory) {
    const { items, results } = await fetchCategory(sources, config, options.now);
    const dedup = deduplicateWithStats(items);
    const ranked = rankNews(dedup.items, config.maxNewsPerCategory);
    const categoryRecords = buildRecords(category, ranked, nextId);

    records.push(...categoryRecords);
    nextId += categoryRecords.length;

    categories.push({
      category,
      sources: results,
      fetched: items.length,
      duplicates: dedup.duplicateCount,
      kept: categoryRecords.length,
    });

    logger.info('Category completed', {
      category,
      fetched: items.length,
      duplicates: dedup.duplicateCount,
      kept: categoryRecords.length,
    });
  }

  const durationMs = Date.now() - startTime;

  logger.info('Feed aggregation completed', {
    records: records.length,
    categories: categories.length,
    durationMs,
  });

  return {
    records,
    categories,
    durationMs,
    completedAt: new Date().toISOString(),
  };
}
