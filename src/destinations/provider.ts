/**
 * ReleaseRelay — Destination Config Providers
 *
 * The webhook URLs are secrets shaped as `{ "urls": [...] }`. Providers
 * resolve them once per invocation and hand back an immutable list.
 */

import { z } from 'zod';
import type { DestinationConfig, DestinationConfigProvider } from '../types';
import { ConfigError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'destinations' });

const WebhookUrlSchema = z
  .string()
  .trim()
  .url()
  .refine(v => /^https?:\/\//i.test(v), 'Webhook URL must use http or https');

const DestinationSecretSchema = z.object({
  urls: z.array(WebhookUrlSchema).min(1, 'At least one webhook URL is required'),
});

function freezeDestinations(urls: Iterable<string>): readonly DestinationConfig[] {
  const unique = [...new Set(urls)];
  return Object.freeze(unique.map(endpointURL => Object.freeze({ endpointURL })));
}

/**
 * Parse the destination secret. Duplicate URLs collapse into one destination.
 */
export function parseDestinationSecret(raw: string): readonly DestinationConfig[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError('Destination secret is not valid JSON', [], { cause: error });
  }

  const parsed = DestinationSecretSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Destination secret is malformed: ${issues.join('; ')}`, issues);
  }

  return freezeDestinations(parsed.data.urls);
}

// ============================================================
// PROVIDERS
// ============================================================

/**
 * Fixed destinations, for tests and local runs.
 */
export class StaticDestinationConfigProvider implements DestinationConfigProvider {
  private readonly destinations: readonly DestinationConfig[];

  constructor(urls: string[]) {
    this.destinations = freezeDestinations(urls);
  }

  async getDestinations(): Promise<readonly DestinationConfig[]> {
    if (this.destinations.length === 0) {
      throw new ConfigError('No destinations configured');
    }
    return this.destinations;
  }
}

/**
 * Reads the secret JSON injected into the environment
 * (`SLACK_WEBHOOK_URLS`) by the deployment's secret manager.
 */
export class EnvDestinationConfigProvider implements DestinationConfigProvider {
  constructor(
    private readonly secret: string | undefined,
    private readonly variable = 'SLACK_WEBHOOK_URLS'
  ) {}

  async getDestinations(): Promise<readonly DestinationConfig[]> {
    if (!this.secret) {
      throw new ConfigError(`${this.variable} is not set`, [this.variable]);
    }
    const destinations = parseDestinationSecret(this.secret);
    log.info('Destinations loaded', { count: destinations.length });
    return destinations;
  }
}

/**
 * Keeps the resolved destinations for `ttlMs` so a long-lived process
 * does not hit the secret backend on every invocation. Failures are not cached.
 */
export class CachedDestinationConfigProvider implements DestinationConfigProvider {
  private cached?: { destinations: readonly DestinationConfig[]; expiresAt: number };

  constructor(
    private readonly inner: DestinationConfigProvider,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async getDestinations(): Promise<readonly DestinationConfig[]> {
    const current = this.now();
    if (this.cached && current < this.cached.expiresAt) {
      return this.cached.destinations;
    }

    const destinations = await this.inner.getDestinations();
    this.cached = { destinations, expiresAt: current + this.ttlMs };
    return destinations;
  }
}
