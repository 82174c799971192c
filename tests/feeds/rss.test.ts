/**
 * Tests for the RSS fallback parser
 */

import { describe, it, expect } from 'vitest';
import { parseRssFeed, RssSource } from '../../src/feeds/rss';
import { collectRecords } from '../../src/feeds/base';
import { ParseError } from '../../src/lib/errors';

const NOW = new Date('2026-10-19T12:00:00Z');

function rssItem(fields: { title?: string; link?: string; pubDate?: string; description?: string }): string {
  return [
    '<item>',
    fields.title !== undefined ? `<title>${fields.title}</title>` : '',
    fields.link !== undefined ? `<link>${fields.link}</link>` : '',
    fields.pubDate !== undefined ? `<pubDate>${fields.pubDate}</pubDate>` : '',
    fields.description !== undefined ? `<description><![CDATA[${fields.description}]]></description>` : '',
    '</item>',
  ].join('');
}

function rssFeed(items: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Recent Announcements</title>
    <link>https://aws.amazon.com/about-aws/whats-new/recent/</link>
    <description>Test feed</description>
    ${items.join('\n    ')}
  </channel>
</rss>`;
}

const recentFeed = rssFeed([
  rssItem({
    title: 'Amazon EC2 test instances',
    link: 'https://aws.amazon.com/about-aws/whats-new/2026/10/ec2-test-instances/',
    pubDate: 'Mon, 19 Oct 2026 10:00:00 GMT',
    description: '<p>New <a href="https://example.test">instances</a> are available.</p>',
  }),
  rssItem({
    title: 'Amazon RDS test engine',
    link: 'https://aws.amazon.com/about-aws/whats-new/2026/10/rds-test-engine/#details',
    pubDate: 'Mon, 19 Oct 2026 02:00:00 GMT',
    description: 'Engine support',
  }),
  rssItem({
    title: 'Old announcement',
    link: 'https://aws.amazon.com/about-aws/whats-new/2026/10/old/',
    pubDate: 'Sat, 17 Oct 2026 09:00:00 GMT',
    description: 'Outside the window',
  }),
]);

describe('parseRssFeed', () => {
  it('should yield records inside the look-back window in feed order', async () => {
    const records = await collectRecords(parseRssFeed(recentFeed, { lookbackHours: 12, now: NOW }));

    expect(records).toEqual([
      {
        id: 'https://aws.amazon.com/about-aws/whats-new/2026/10/ec2-test-instances/',
        link: 'https://aws.amazon.com/about-aws/whats-new/2026/10/ec2-test-instances/',
        title: 'Amazon EC2 test instances',
        body: 'New instances are available.',
        publishedAt: '2026-10-19T10:00:00.000Z',
      },
      {
        id: 'https://aws.amazon.com/about-aws/whats-new/2026/10/rds-test-engine/',
        link: 'https://aws.amazon.com/about-aws/whats-new/2026/10/rds-test-engine/',
        title: 'Amazon RDS test engine',
        body: 'Engine support',
        publishedAt: '2026-10-19T02:00:00.000Z',
      },
    ]);
  });

  it('should widen the window with a longer look-back', async () => {
    const records = await collectRecords(parseRssFeed(recentFeed, { lookbackHours: 72, now: NOW }));
    expect(records.map(r => r.title)).toEqual([
      'Amazon EC2 test instances',
      'Amazon RDS test engine',
      'Old announcement',
    ]);
  });

  it('should exclude an entry published exactly at the cutoff', async () => {
    const feed = rssFeed([
      rssItem({
        title: 'Boundary',
        link: 'https://example.test/boundary',
        pubDate: 'Mon, 19 Oct 2026 00:00:00 GMT',
      }),
    ]);

    const records = await collectRecords(parseRssFeed(feed, { lookbackHours: 12, now: NOW }));
    expect(records).toEqual([]);
  });

  it('should leave the body empty when there is no description', async () => {
    const feed = rssFeed([
      rssItem({
        title: 'No description',
        link: 'https://example.test/no-description',
        pubDate: 'Mon, 19 Oct 2026 09:00:00 GMT',
      }),
    ]);

    const [record] = await collectRecords(parseRssFeed(feed, { lookbackHours: 12, now: NOW }));
    expect(record.body).toBe('');
  });

  it('should reject an item without a link', async () => {
    const feed = rssFeed([rssItem({ title: 'No link', pubDate: 'Mon, 19 Oct 2026 09:00:00 GMT' })]);

    await expect(
      collectRecords(parseRssFeed(feed, { lookbackHours: 12, now: NOW }))
    ).rejects.toThrow('RSS item 0 is missing its link or title');
  });

  it('should ignore incomplete items outside the window', async () => {
    const feed = rssFeed([
      rssItem({
        title: 'Recent',
        link: 'https://example.test/recent',
        pubDate: 'Mon, 19 Oct 2026 09:00:00 GMT',
      }),
      rssItem({ link: 'https://example.test/untitled', pubDate: 'Tue, 12 Mar 2024 09:00:00 GMT' }),
      rssItem({ title: 'Unlinked', pubDate: 'Tue, 12 Mar 2024 08:00:00 GMT' }),
    ]);

    const records = await collectRecords(parseRssFeed(feed, { lookbackHours: 12, now: NOW }));
    expect(records.map(r => r.id)).toEqual(['https://example.test/recent']);
  });

  it('should reject an item with an unparseable pubDate', async () => {
    const feed = rssFeed([
      rssItem({ title: 'Bad date', link: 'https://example.test/bad-date', pubDate: 'sometime' }),
    ]);

    await expect(
      collectRecords(parseRssFeed(feed, { lookbackHours: 12, now: NOW }))
    ).rejects.toThrow(ParseError);
  });

  it('should reject a payload that is not XML', async () => {
    await expect(
      collectRecords(parseRssFeed('{"items": []}', { lookbackHours: 12, now: NOW }))
    ).rejects.toThrow(ParseError);
  });
});

describe('RssSource', () => {
  it('should filter against its clock', async () => {
    const source = new RssSource('https://feed.test/rss', 1000, 12, () => NOW);

    const records = await collectRecords(source.parse(recentFeed));

    expect(source.format).toBe('rss');
    expect(records).toHaveLength(2);
  });
});
