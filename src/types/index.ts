/**
 * Newscast — Type Exports
 */

export type {
  FeedSourceDefinition,
  FeedTable,
  MediaRef,
  FeedEntry,
  NewsItem,
} from './feed-item';
export { FeedSourceDefinitionSchema, FeedTableSchema } from './feed-item';

export type { PodcastRecord } from './podcast';
export { PodcastRecordSchema, PodcastStoreSchema } from './podcast';
