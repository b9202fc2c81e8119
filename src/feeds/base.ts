/**
 * Newscast — Feed Source Base
 *
 * Abstract base class for all feed sources.
 * Subclasses only know how to read raw entries; cleaning, the item
 * limit and failure isolation live here.
 */

import type { FeedEntry, FeedSourceDefinition, NewsItem } from '../types';
import { logger, type Logger } from '../lib/logger';
import { getErrorMessage } from '../lib/errors';
import { normalizeEntries, type NormalizeOptions } from './normalizer';

export interface FetchOptions extends NormalizeOptions {
  /** Raw entries to consider, taken from the top of the feed */
  maxEntries: number;
}

/**
 * Abstract base class for feed sources.
 */
export abstract class FeedSource {
  readonly name: string;
  readonly url: string;
  /** Stored for reference; ordering never consults it. */
  readonly priority: number;

  protected logger: Logger;

  constructor(definition: FeedSourceDefinition) {
    this.name = definition.name;
    this.url = definition.url;
    this.priority = definition.priority;
    this.logger = logger.child({ source: definition.name });
  }

  getDefinition(): FeedSourceDefinition {
    return { name: this.name, url: this.url, priority: this.priority };
  }

  /**
   * Read raw entries from the source, in feed order.
   * May throw; fetch() contains the failure.
   */
  abstract fetchEntries(): Promise<FeedEntry[]>;

  /**
   * Fetch and normalize. Never throws: any failure is logged and
   * yields an empty list.
   */
  async fetch(options: FetchOptions): Promise<NewsItem[]> {
    const startTime = Date.now();
    this.logger.info('Starting fetch', { url: this.url });

    try {
      const entries = await this.fetchEntries();

      if (entries.length === 0) {
        this.logger.warn('Feed returned no entries', { url: this.url });
        return [];
      }

      const items = normalizeEntries(entries.slice(0, options.maxEntries), this.name, options);

      this.logger.info('Fetch completed', {
        entriesFound: entries.length,
        items: items.length,
        durationMs: Date.now() - startTime,
      });

      return items;
    } catch (error) {
      this.logger.warn('Fetch failed', {
        url: this.url,
        error: getErrorMessage(error),
        durationMs: Date.now() - startTime,
      });
      return [];
    }
  }
}

/**
 * Builds a source from its configuration entry.
 */
export type FeedSourceFactory = (definition: FeedSourceDefinition) => FeedSource;
