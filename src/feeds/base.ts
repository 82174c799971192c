/**
 * ReleaseRelay — Feed Source Base
 *
 * A feed source pairs an upstream URL with the parser for its payload
 * format. Fetching does I/O; parsing never does.
 */

import type { AnnouncementRecord, FeedFormat } from '../types';
import { fetchFeed } from './fetcher';
import { logger, type Logger } from '../lib/logger';

export abstract class FeedSource {
  abstract readonly format: FeedFormat;

  /** Accept header sent with the feed request. */
  protected abstract readonly accept: string;

  protected logger: Logger;

  constructor(
    readonly url: string,
    protected readonly timeoutMs: number
  ) {
    this.logger = logger.child({ source: this.constructor.name });
  }

  /**
   * Fetch the raw payload. Fails with FetchError.
   */
  async fetch(): Promise<string> {
    this.logger.debug('Fetching feed', { url: this.url });
    const payload = await fetchFeed(this.url, { timeoutMs: this.timeoutMs, accept: this.accept });
    this.logger.debug('Feed fetched', { bytes: payload.length });
    return payload;
  }

  /**
   * Lazily yield records in feed order. Fails with ParseError.
   */
  abstract parse(payload: string): AsyncIterable<AnnouncementRecord>;
}

/**
 * Drain a parsed feed into an array, so malformed entries surface
 * before any record is processed.
 */
export async function collectRecords(
  records: AsyncIterable<AnnouncementRecord>
): Promise<AnnouncementRecord[]> {
  const collected: AnnouncementRecord[] = [];
  for await (const record of records) {
    collected.push(record);
  }
  return collected;
}
