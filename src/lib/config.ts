/**
 * ReleaseRelay — Configuration
 *
 * Reads the environment once into an immutable RelayConfig.
 * Entry points load `.env` with dotenv before calling loadConfig.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { ProcessingOrder } from '../types';

export const DEFAULT_SEARCH_API_URL =
  'https://aws.amazon.com/api/dirs/items/search' +
  '?item.directoryId=whats-new&sort_by=item.additionalFields.postDateTime' +
  '&sort_order=desc&size=25&item.locale=en_US';

export const DEFAULT_RSS_URL = 'https://aws.amazon.com/about-aws/whats-new/recent/feed/';

export const DEFAULT_SITE_ORIGIN = 'https://aws.amazon.com';

// ============================================================
// SCHEMA
// ============================================================

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

// Empty strings count as unset
const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

const EnvSchema = z.object({
  FEED_SEARCH_API_URL: z.string().url().default(DEFAULT_SEARCH_API_URL),
  FEED_RSS_URL: z
    .string()
    .default(DEFAULT_RSS_URL)
    .refine(v => v === '' || z.string().url().safeParse(v).success, 'Invalid url'),
  FEED_SITE_ORIGIN: z.string().url().default(DEFAULT_SITE_ORIGIN),
  RSS_LOOKBACK_HOURS: intFromEnv(12, 1),
  FETCH_TIMEOUT_MS: intFromEnv(15_000, 100),
  INVOCATION_TIMEOUT_MS: intFromEnv(55_000, 1_000),
  DELIVERY_CONCURRENCY: intFromEnv(4, 1),
  PROCESSING_ORDER: z.enum(['oldest-first', 'source']).default('oldest-first'),
  SLACK_WEBHOOK_URLS: optionalString,
  DESTINATIONS_CACHE_TTL_MS: intFromEnv(4 * 60 * 60 * 1000, 0),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  TRIGGER_PORT: intFromEnv(3001, 1),
  TRIGGER_TOKEN: optionalString,
});

// ============================================================
// CONFIG VALUE
// ============================================================

export interface FeedConfig {
  readonly searchApiUrl: string;
  /** Undefined disables the RSS fallback. */
  readonly rssUrl?: string;
  readonly siteOrigin: string;
  readonly rssLookbackHours: number;
}

export interface RelayConfig {
  readonly feed: FeedConfig;
  readonly fetchTimeoutMs: number;
  readonly invocationTimeoutMs: number;
  readonly deliveryConcurrency: number;
  readonly processingOrder: ProcessingOrder;
  readonly destinationsSecret?: string;
  readonly destinationsCacheTtlMs: number;
  readonly supabase?: {
    readonly url: string;
    readonly serviceRoleKey: string;
  };
  readonly trigger: {
    readonly port: number;
    readonly token?: string;
  };
}

/**
 * Validate an environment map into a frozen RelayConfig.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;

  if (Boolean(e.SUPABASE_URL) !== Boolean(e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new ConfigError(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together',
      ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY']
    );
  }

  const config: RelayConfig = {
    feed: Object.freeze({
      searchApiUrl: e.FEED_SEARCH_API_URL,
      rssUrl: e.FEED_RSS_URL === '' ? undefined : e.FEED_RSS_URL,
      siteOrigin: e.FEED_SITE_ORIGIN.replace(/\/$/, ''),
      rssLookbackHours: e.RSS_LOOKBACK_HOURS,
    }),
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    invocationTimeoutMs: e.INVOCATION_TIMEOUT_MS,
    deliveryConcurrency: e.DELIVERY_CONCURRENCY,
    processingOrder: e.PROCESSING_ORDER,
    destinationsSecret: e.SLACK_WEBHOOK_URLS,
    destinationsCacheTtlMs: e.DESTINATIONS_CACHE_TTL_MS,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? Object.freeze({
            url: e.SUPABASE_URL,
            serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
          })
        : undefined,
    trigger: Object.freeze({
      port: e.TRIGGER_PORT,
      token: e.TRIGGER_TOKEN,
    }),
  };

  return Object.freeze(config);
}
