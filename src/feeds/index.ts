/**
 * ReleaseRelay — Feeds Module
 *
 * Fetches the announcements feed and parses it into records.
 */

import type { RelayConfig } from '../lib/config';
import type { FeedSource } from './base';
import { SearchApiSource } from './search-api';
import { RssSource } from './rss';

export { FeedSource, collectRecords } from './base';
export { fetchFeed, type FetchFeedOptions } from './fetcher';
export { SearchApiSource, parseSearchApiFeed, type SearchApiParseOptions } from './search-api';
export { RssSource, parseRssFeed, type RssParseOptions } from './rss';
export { htmlToText, canonicalUrl, toIsoDate } from './text';

/**
 * Sources in the order they are tried: search API first, then RSS.
 */
export function createFeedSources(config: RelayConfig): FeedSource[] {
  const sources: FeedSource[] = [
    new SearchApiSource(config.feed.searchApiUrl, config.fetchTimeoutMs, config.feed.siteOrigin),
  ];

  if (config.feed.rssUrl) {
    sources.push(new RssSource(config.feed.rssUrl, config.fetchTimeoutMs, config.feed.rssLookbackHours));
  }

  return sources;
}
