/**
 * ReleaseRelay — Supabase Client
 *
 * Service-role client for the dedup table. Background jobs only:
 * the service key bypasses Row Level Security.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { StoreUnavailableError } from '../lib/errors';

// ============================================================
// DATABASE TYPES
// ============================================================

export interface SeenAnnouncementRow {
  id: string;
  delivered_at: string;
  title: string | null;
  published_at: string | null;
}

export const SEEN_TABLE = 'seen_announcements';

// ============================================================
// CLIENT INSTANCES
// ============================================================

export function createAdminClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

// ============================================================
// UTILITY FUNCTIONS
// ============================================================

/**
 * Translate a Supabase/PostgREST error into StoreUnavailableError.
 */
export function handleSupabaseError(error: unknown, operation: string): StoreUnavailableError {
  if (error && typeof error === 'object' && 'message' in error) {
    const { message, code } = error as { message: unknown; code?: unknown };
    const suffix = typeof code === 'string' && code ? ` (code: ${code})` : '';
    return new StoreUnavailableError(`Supabase ${operation} failed: ${String(message)}${suffix}`, {
      cause: error,
    });
  }
  return new StoreUnavailableError(`Supabase ${operation} failed: ${String(error)}`, { cause: error });
}
