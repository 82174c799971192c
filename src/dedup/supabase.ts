/**
 * ReleaseRelay — Supabase Dedup Store
 *
 * One row per delivered announcement in `seen_announcements`, keyed by id.
 * Postgres reads are strongly consistent, so a committed id is visible to
 * the very next invocation.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { DedupStore, SeenEntry } from '../types';
import { SEEN_TABLE, handleSupabaseError, type SeenAnnouncementRow } from '../db/client';
import { StoreUnavailableError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'supabase-dedup-store' });

export class SupabaseDedupStore implements DedupStore {
  constructor(private readonly client: SupabaseClient) {}

  async has(id: string): Promise<boolean> {
    try {
      const { data, error } = await this.client
        .from(SEEN_TABLE)
        .select('id')
        .eq('id', id)
        .limit(1);

      if (error) throw handleSupabaseError(error, 'lookup');
      return (data ?? []).length > 0;
    } catch (error) {
      throw this.asStoreError(error, 'lookup');
    }
  }

  async markSeen(entry: SeenEntry): Promise<void> {
    const row: SeenAnnouncementRow = {
      id: entry.id,
      delivered_at: entry.deliveredAt,
      title: entry.title ?? null,
      published_at: entry.publishedAt ?? null,
    };

    try {
      // ignoreDuplicates turns a second insert of the same id into a no-op
      const { error } = await this.client
        .from(SEEN_TABLE)
        .upsert(row, { onConflict: 'id', ignoreDuplicates: true });

      if (error) throw handleSupabaseError(error, 'insert');
    } catch (error) {
      throw this.asStoreError(error, 'insert');
    }

    log.debug('Marked announcement as seen', { id: entry.id });
  }

  private asStoreError(error: unknown, operation: string): StoreUnavailableError {
    return error instanceof StoreUnavailableError ? error : handleSupabaseError(error, operation);
  }
}
