/**
 * ReleaseRelay — Dedup Store Module
 */

import type { RelayConfig } from '../lib/config';
import type { DedupStore } from '../types';
import { createAdminClient } from '../db/client';
import { ConfigError } from '../lib/errors';
import { SupabaseDedupStore } from './supabase';

export { InMemoryDedupStore } from './memory';
export { SupabaseDedupStore } from './supabase';

/**
 * Build the persistent store from configuration.
 */
export function createDedupStore(config: RelayConfig): DedupStore {
  if (!config.supabase) {
    throw new ConfigError(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the dedup store',
      ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY']
    );
  }
  return new SupabaseDedupStore(createAdminClient(config.supabase.url, config.supabase.serviceRoleKey));
}
