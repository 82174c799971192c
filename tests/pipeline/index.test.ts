/**
 * Tests for pipeline wiring from configuration
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createFeedSources, RssSource, SearchApiSource } from '../../src/feeds';
import { createRelayPipeline } from '../../src/pipeline';
import { InMemoryDedupStore } from '../../src/dedup';
import { StaticDestinationConfigProvider } from '../../src/destinations/provider';
import { loadConfig, DEFAULT_RSS_URL, DEFAULT_SEARCH_API_URL } from '../../src/lib/config';
import { FetchError } from '../../src/lib/errors';

const mockFetch = vi.fn();
global.fetch = mockFetch;

describe('createFeedSources', () => {
  it('should try the search API first and RSS second by default', () => {
    const sources = createFeedSources(loadConfig({}));

    expect(sources).toHaveLength(2);
    expect(sources[0]).toBeInstanceOf(SearchApiSource);
    expect(sources[0].url).toBe(DEFAULT_SEARCH_API_URL);
    expect(sources[1]).toBeInstanceOf(RssSource);
    expect(sources[1].url).toBe(DEFAULT_RSS_URL);
  });

  it('should leave out the RSS fallback when its url is empty', () => {
    const sources = createFeedSources(loadConfig({ FEED_RSS_URL: '' }));

    expect(sources).toHaveLength(1);
    expect(sources[0]).toBeInstanceOf(SearchApiSource);
  });
});

describe('createRelayPipeline', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should fail with the primary feed error when no fallback is configured', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));
    const pipeline = createRelayPipeline(
      loadConfig({ FEED_SEARCH_API_URL: 'https://feed.test/api', FEED_RSS_URL: '' }),
      {
        store: new InMemoryDedupStore(),
        destinations: new StaticDestinationConfigProvider(['https://hooks.slack.test/services/T000/B000/aaaa']),
      }
    );

    const error = await pipeline.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ message: 'Feed request failed: fetch failed', url: 'https://feed.test/api' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(pipeline.state).toBe('FAILED');
  });
});
