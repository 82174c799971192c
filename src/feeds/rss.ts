/**
 * ReleaseRelay — RSS Feed Source
 *
 * Fallback source. The RSS feed carries a long history, so only entries
 * published inside the look-back window are yielded.
 */

import Parser from 'rss-parser';
import type { AnnouncementRecord } from '../types';
import { FeedSource } from './base';
import { ParseError, errorMessage } from '../lib/errors';
import { canonicalUrl, htmlToText, toIsoDate } from './text';

const HOUR_MS = 60 * 60 * 1000;

export interface RssParseOptions {
  lookbackHours: number;
  now: Date;
}

function publishedAtOf(item: Parser.Item, index: number): string {
  const dateField = item.pubDate ?? item.isoDate;
  const publishedAt = dateField ? toIsoDate(dateField) : undefined;
  if (!publishedAt) {
    throw new ParseError(`RSS item ${index} has no valid pubDate`);
  }
  return publishedAt;
}

function toRecord(item: Parser.Item, index: number, publishedAt: string): AnnouncementRecord {
  if (!item.link || !item.title) {
    throw new ParseError(`RSS item ${index} is missing its link or title`);
  }

  let link: string;
  try {
    link = canonicalUrl(item.link);
  } catch (error) {
    throw new ParseError(`RSS item ${index} has an invalid link: ${item.link}`, { cause: error });
  }

  return {
    id: link,
    title: item.title.trim(),
    body: htmlToText(item.content ?? ''),
    publishedAt,
    link,
  };
}

/**
 * Only items inside the look-back window are validated; older entries
 * are skipped whatever their shape.
 */
export async function* parseRssFeed(
  payload: string,
  options: RssParseOptions
): AsyncGenerator<AnnouncementRecord> {
  const parser = new Parser();
  const feed = await parser.parseString(payload).catch((error: unknown) => {
    throw new ParseError(`RSS payload could not be parsed: ${errorMessage(error)}`, { cause: error });
  });

  const cutoff = options.now.getTime() - options.lookbackHours * HOUR_MS;

  for (const [index, item] of feed.items.entries()) {
    const publishedAt = publishedAtOf(item, index);
    if (Date.parse(publishedAt) > cutoff) {
      yield toRecord(item, index, publishedAt);
    }
  }
}

export class RssSource extends FeedSource {
  readonly format = 'rss' as const;
  protected readonly accept = 'application/rss+xml, application/xml;q=0.9, */*;q=0.5';

  constructor(
    url: string,
    timeoutMs: number,
    private readonly lookbackHours: number,
    private readonly clock: () => Date = () => new Date()
  ) {
    super(url, timeoutMs);
  }

  parse(payload: string): AsyncIterable<AnnouncementRecord> {
    return parseRssFeed(payload, { lookbackHours: this.lookbackHours, now: this.clock() });
  }
}
