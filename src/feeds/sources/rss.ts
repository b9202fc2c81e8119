/**
 * Newscast — RSS/Atom Feed Source
 *
 * Downloads a syndication feed, parses it with rss-parser and maps
 * each parsed item onto the FeedEntry shape the normalizer understands.
 */

import Parser from 'rss-parser';
import { FeedSource, type FeedSourceFactory } from '../base';
import type { FeedEntry, FeedSourceDefinition, MediaRef } from '../../types';

const DEFAULT_TIMEOUT_MS = 30000;
const USER_AGENT = 'newscast/0.1 (+rss)';
const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5';

const ATOM_DATE_PATTERN = /<(published|updated)(\s[^>]*)?>([^<]*)<\/\1>/g;

/**
 * Fields rss-parser does not map by itself.
 * xml2js yields attribute-only elements as `{ $: { ... } }`.
 */
interface RssCustomItem {
  description?: unknown;
  updated?: unknown;
  dcDate?: unknown;
  mediaContent?: unknown[];
  mediaThumbnail?: unknown[];
  enclosures?: unknown[];
}

type RssFeed = Parser.Output<RssCustomItem>;
type RssItem = RssFeed['items'][number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  // Elements with attributes come back as { _: text, $: attrs }
  if (isRecord(value) && typeof value._ === 'string') return value._;
  return undefined;
}

function toMediaRef(value: unknown): MediaRef | undefined {
  if (!isRecord(value)) return undefined;
  const attrs = isRecord(value.$) ? value.$ : value;
  return {
    url: asString(attrs.url),
    type: asString(attrs.type),
  };
}

function toMediaRefs(values: unknown[] | undefined): MediaRef[] | undefined {
  if (!values) return undefined;
  return values.map(toMediaRef).filter((ref): ref is MediaRef => ref !== undefined);
}

/**
 * Map an rss-parser item onto a FeedEntry.
 */
export function toFeedEntry(item: RssItem): FeedEntry {
  return {
    title: item.title,
    link: item.link,
    // RSS <description> arrives as `content`, Atom <summary> as `summary`
    summary: item.summary ?? item.content,
    description: asString(item.description),
    published: item.pubDate,
    updated: asString(item.updated) ?? asString(item.dcDate),
    mediaContent: toMediaRefs(item.mediaContent),
    mediaThumbnail: toMediaRefs(item.mediaThumbnail),
    enclosures:
      toMediaRefs(item.enclosures) ??
      (item.enclosure ? [{ url: item.enclosure.url, type: item.enclosure.type }] : undefined),
  };
}

/**
 * Empty every Atom `<published>`/`<updated>` whose value is not a
 * parseable date. rss-parser converts entry dates itself and rejects
 * the whole document when one of them is invalid.
 */
export function blankInvalidDates(xml: string): string {
  return xml.replace(
    ATOM_DATE_PATTERN,
    (element: string, tag: string, attrs: string | undefined, value: string) =>
      Number.isNaN(new Date(value).getTime()) ? `<${tag}${attrs ?? ''}></${tag}>` : element
  );
}

export interface RssSourceOptions {
  /** Transport timeout for the feed request */
  timeoutMs?: number;
}

/**
 * Feed source backed by an RSS 2.0 / RSS 1.0 / Atom endpoint.
 */
export class RssFeedSource extends FeedSource {
  protected readonly parser: Parser<Record<string, unknown>, RssCustomItem>;
  private readonly timeoutMs: number;

  constructor(definition: FeedSourceDefinition, options: RssSourceOptions = {}) {
    super(definition);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.parser = new Parser<Record<string, unknown>, RssCustomItem>({
      customFields: {
        item: [
          ['description', 'description'],
          ['updated', 'updated'],
          ['dc:date', 'dcDate'],
          ['media:content', 'mediaContent', { keepArray: true }],
          ['media:thumbnail', 'mediaThumbnail', { keepArray: true }],
          ['enclosure', 'enclosures', { keepArray: true }],
        ],
      },
    });
  }

  /**
   * Download the raw feed document.
   */
  protected async readDocument(): Promise<string> {
    const response = await fetch(this.url, {
      headers: { 'User-Agent': USER_AGENT, Accept: FEED_ACCEPT },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Failed to fetch feed: ${response.status}`);
    }
    return response.text();
  }

  protected async readFeed(): Promise<RssFeed> {
    const xml = await this.readDocument();
    return this.parser.parseString(blankInvalidDates(xml));
  }

  async fetchEntries(): Promise<FeedEntry[]> {
    const feed = await this.readFeed();
    return (feed.items ?? []).map(toFeedEntry);
  }
}

/**
 * Factory producing RSS sources with shared transport options.
 */
export function createRssSourceFactory(options: RssSourceOptions = {}): FeedSourceFactory {
  return definition => new RssFeedSource(definition, options);
}
