/**
 * Tests for destination config providers
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CachedDestinationConfigProvider,
  EnvDestinationConfigProvider,
  StaticDestinationConfigProvider,
  parseDestinationSecret,
} from '../../src/destinations/provider';
import { ConfigError } from '../../src/lib/errors';
import type { DestinationConfigProvider } from '../../src/types';

const HOOK_A = 'https://hooks.slack.test/services/T000/B000/aaaa';
const HOOK_B = 'https://hooks.slack.test/services/T000/B000/bbbb';

describe('parseDestinationSecret', () => {
  it('should parse the urls list in order', () => {
    const destinations = parseDestinationSecret(JSON.stringify({ urls: [HOOK_A, HOOK_B] }));

    expect(destinations).toEqual([{ endpointURL: HOOK_A }, { endpointURL: HOOK_B }]);
  });

  it('should collapse duplicate urls', () => {
    const destinations = parseDestinationSecret(JSON.stringify({ urls: [HOOK_A, ` ${HOOK_A} `] }));

    expect(destinations).toEqual([{ endpointURL: HOOK_A }]);
  });

  it('should return an immutable list', () => {
    const destinations = parseDestinationSecret(JSON.stringify({ urls: [HOOK_A] }));

    expect(Object.isFrozen(destinations)).toBe(true);
    expect(Object.isFrozen(destinations[0])).toBe(true);
  });

  it('should reject invalid JSON', () => {
    expect(() => parseDestinationSecret('urls=a,b')).toThrow('Destination secret is not valid JSON');
  });

  it('should reject an empty list', () => {
    expect(() => parseDestinationSecret(JSON.stringify({ urls: [] }))).toThrow(
      'Destination secret is malformed: urls: At least one webhook URL is required'
    );
  });

  it('should reject a non-http url', () => {
    expect(() => parseDestinationSecret(JSON.stringify({ urls: ['ftp://hooks.slack.test/x'] }))).toThrow(
      'Destination secret is malformed: urls.0: Webhook URL must use http or https'
    );
  });

  it('should list the issues on the error', () => {
    const error = (() => {
      try {
        parseDestinationSecret(JSON.stringify({ hooks: [HOOK_A] }));
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'CONFIG_INVALID', issues: ['urls: Required'] });
  });
});

describe('StaticDestinationConfigProvider', () => {
  it('should return the configured urls', async () => {
    const provider = new StaticDestinationConfigProvider([HOOK_A, HOOK_B]);

    expect(await provider.getDestinations()).toEqual([{ endpointURL: HOOK_A }, { endpointURL: HOOK_B }]);
  });

  it('should fail when empty', async () => {
    await expect(new StaticDestinationConfigProvider([]).getDestinations()).rejects.toThrow(
      'No destinations configured'
    );
  });
});

describe('EnvDestinationConfigProvider', () => {
  it('should parse the secret', async () => {
    const provider = new EnvDestinationConfigProvider(JSON.stringify({ urls: [HOOK_A] }));

    expect(await provider.getDestinations()).toEqual([{ endpointURL: HOOK_A }]);
  });

  it('should name the variable when the secret is missing', async () => {
    await expect(new EnvDestinationConfigProvider(undefined).getDestinations()).rejects.toThrow(
      'SLACK_WEBHOOK_URLS is not set'
    );
  });
});

describe('CachedDestinationConfigProvider', () => {
  it('should reuse destinations until the ttl expires', async () => {
    let now = 1_000;
    let calls = 0;
    const inner: DestinationConfigProvider = {
      async getDestinations() {
        calls++;
        return [{ endpointURL: HOOK_A }];
      },
    };
    const cached = new CachedDestinationConfigProvider(inner, 500, () => now);

    await cached.getDestinations();
    now = 1_499;
    await cached.getDestinations();
    expect(calls).toBe(1);

    now = 1_500;
    await cached.getDestinations();
    expect(calls).toBe(2);
  });

  it('should not cache failures', async () => {
    const getDestinations = vi
      .fn<() => Promise<{ endpointURL: string }[]>>()
      .mockRejectedValueOnce(new ConfigError('secret backend down'))
      .mockResolvedValueOnce([{ endpointURL: HOOK_B }]);
    const cached = new CachedDestinationConfigProvider({ getDestinations }, 60_000, () => 0);

    await expect(cached.getDestinations()).rejects.toThrow('secret backend down');
    expect(await cached.getDestinations()).toEqual([{ endpointURL: HOOK_B }]);
    expect(getDestinations).toHaveBeenCalledTimes(2);
  });
});
