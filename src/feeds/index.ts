/**
 * Newscast — Feeds Module
 *
 * Fetch → clean → extract → deduplicate → rank → cap → identify.
 */

export { FeedSource, type FetchOptions, type FeedSourceFactory } from './base';

export { normalizeEntry, normalizeEntries, type NormalizeOptions } from './normalizer';

export { extractImage, extractDate, formatDate } from './extract';

export {
  deduplicate,
  deduplicateWithStats,
  normalizeTitle,
  type DedupResult,
} from './dedup';

export {
  aggregateFeeds,
  rankNews,
  buildRecords,
  type AggregatorConfig,
  type AggregatorOptions,
  type AggregatorResult,
  type CategoryResult,
  type SourceFetchResult,
} from './aggregator';

export { RssFeedSource, createRssSourceFactory, toFeedEntry } from './sources';
