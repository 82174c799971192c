/**
 * ReleaseRelay — Search API Feed Source
 *
 * The "What's New" directory search API returns a JSON document with the
 * latest announcements, newest first. It is not a published API, so the
 * RSS source stands behind it as a fallback.
 */

import { z } from 'zod';
import type { AnnouncementRecord } from '../types';
import { FeedSource } from './base';
import { ParseError } from '../lib/errors';
import { canonicalUrl, htmlToText, toIsoDate } from './text';

const SearchApiItemSchema = z.object({
  item: z.object({
    additionalFields: z.object({
      headline: z.string().min(1),
      headlineUrl: z.string().min(1),
      postDateTime: z.string().min(1),
      postSummary: z.string().default(''),
    }),
  }),
});

const SearchApiEnvelopeSchema = z.object({
  items: z.array(z.unknown()),
});

export interface SearchApiParseOptions {
  /** Origin prefixed to relative headline URLs. */
  siteOrigin: string;
}

function resolveLink(headlineUrl: string, siteOrigin: string): string {
  if (/^https?:\/\//i.test(headlineUrl)) return headlineUrl;
  const path = headlineUrl.startsWith('/') ? headlineUrl : `/${headlineUrl}`;
  return `${siteOrigin}${path}`;
}

function toRecord(raw: unknown, index: number, options: SearchApiParseOptions): AnnouncementRecord {
  const parsed = SearchApiItemSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ParseError(
      `Search API item ${index} is malformed: ${issue.path.join('.')} ${issue.message}`
    );
  }

  const fields = parsed.data.item.additionalFields;
  const publishedAt = toIsoDate(fields.postDateTime);
  if (!publishedAt) {
    throw new ParseError(`Search API item ${index} has an invalid postDateTime: ${fields.postDateTime}`);
  }

  let link: string;
  try {
    link = canonicalUrl(resolveLink(fields.headlineUrl, options.siteOrigin));
  } catch (error) {
    throw new ParseError(`Search API item ${index} has an invalid headlineUrl: ${fields.headlineUrl}`, {
      cause: error,
    });
  }

  return {
    id: link,
    title: fields.headline.trim(),
    body: htmlToText(fields.postSummary),
    publishedAt,
    link,
  };
}

/**
 * Parse a search API payload. The envelope is checked on the first
 * iteration; each item is validated as it is yielded.
 */
export async function* parseSearchApiFeed(
  payload: string,
  options: SearchApiParseOptions
): AsyncGenerator<AnnouncementRecord> {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    throw new ParseError('Search API payload is not valid JSON', { cause: error });
  }

  const envelope = SearchApiEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new ParseError('Search API payload has no items array');
  }

  for (const [index, raw] of envelope.data.items.entries()) {
    yield toRecord(raw, index, options);
  }
}

export class SearchApiSource extends FeedSource {
  readonly format = 'search_api' as const;
  protected readonly accept = 'application/json';

  constructor(
    url: string,
    timeoutMs: number,
    private readonly siteOrigin: string
  ) {
    super(url, timeoutMs);
  }

  parse(payload: string): AsyncIterable<AnnouncementRecord> {
    return parseSearchApiFeed(payload, { siteOrigin: this.siteOrigin });
  }
}
