/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import {
  loadConfig,
  DEFAULT_RSS_URL,
  DEFAULT_SEARCH_API_URL,
} from '../../src/lib/config';
import { ConfigError } from '../../src/lib/errors';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      feed: {
        searchApiUrl: DEFAULT_SEARCH_API_URL,
        rssUrl: DEFAULT_RSS_URL,
        siteOrigin: 'https://aws.amazon.com',
        rssLookbackHours: 12,
      },
      fetchTimeoutMs: 15_000,
      invocationTimeoutMs: 55_000,
      deliveryConcurrency: 4,
      processingOrder: 'oldest-first',
      destinationsSecret: undefined,
      destinationsCacheTtlMs: 14_400_000,
      supabase: undefined,
      trigger: { port: 3001, token: undefined },
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({
      RSS_LOOKBACK_HOURS: '24',
      FETCH_TIMEOUT_MS: '5000',
      DELIVERY_CONCURRENCY: '2',
      TRIGGER_PORT: '8080',
    });

    expect(config.feed.rssLookbackHours).toBe(24);
    expect(config.fetchTimeoutMs).toBe(5000);
    expect(config.deliveryConcurrency).toBe(2);
    expect(config.trigger.port).toBe(8080);
  });

  it('should disable the RSS fallback with an empty url', () => {
    expect(loadConfig({ FEED_RSS_URL: '' }).feed.rssUrl).toBeUndefined();
  });

  it('should strip a trailing slash from the site origin', () => {
    expect(loadConfig({ FEED_SITE_ORIGIN: 'https://example.test/' }).feed.siteOrigin).toBe(
      'https://example.test'
    );
  });

  it('should treat blank secrets as unset', () => {
    const config = loadConfig({ TRIGGER_TOKEN: '   ', SLACK_WEBHOOK_URLS: '' });

    expect(config.trigger.token).toBeUndefined();
    expect(config.destinationsSecret).toBeUndefined();
  });

  it('should read Supabase settings together', () => {
    const config = loadConfig({
      SUPABASE_URL: 'https://db.test',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });

    expect(config.supabase).toEqual({ url: 'https://db.test', serviceRoleKey: 'test-secret' });
  });

  it('should reject half of the Supabase settings', () => {
    expect(() => loadConfig({ SUPABASE_URL: 'https://db.test' })).toThrow(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together'
    );
  });

  it('should list invalid variables on the error', () => {
    const error = (() => {
      try {
        loadConfig({ DELIVERY_CONCURRENCY: '0', PROCESSING_ORDER: 'random' });
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      issues: [
        'DELIVERY_CONCURRENCY: Number must be greater than or equal to 1',
        "PROCESSING_ORDER: Invalid enum value. Expected 'oldest-first' | 'source', received 'random'",
      ],
    });
  });

  it('should return a frozen value', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.feed)).toBe(true);
  });
});
