/**
 * Newscast — Feed Sources Index
 */

export { RssFeedSource, blankInvalidDates, createRssSourceFactory, toFeedEntry, type RssSourceOptions } from './rss';
