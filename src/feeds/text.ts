/**
 * ReleaseRelay — Text helpers for feed content
 */

import * as cheerio from 'cheerio';

/**
 * Strip markup from an HTML fragment, decoding entities and
 * collapsing whitespace.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  // Keep words in adjacent block elements apart
  $('br, p, li, div').after(' ');
  return $.root().text().replace(/\s+/g, ' ').trim();
}

/**
 * Canonical form of an announcement URL, used as the dedup key.
 * Drops the fragment; everything else is kept verbatim.
 */
export function canonicalUrl(link: string): string {
  const url = new URL(link.trim());
  url.hash = '';
  return url.toString();
}

/**
 * Parse a feed date into ISO-8601 UTC, or undefined when unparseable.
 */
export function toIsoDate(value: string): string | undefined {
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : new Date(time).toISOString();
}
