/**
 * ReleaseRelay — Announcement Types
 *
 * Records produced by the feed parsers and the rows persisted
 * once a record has been delivered everywhere.
 */

// ============================================================
// FEED RECORDS
// ============================================================

/**
 * One normalized entry of the upstream announcements feed.
 * `id` is the canonical announcement URL and doubles as the dedup key.
 */
export interface AnnouncementRecord {
  readonly id: string;
  readonly title: string;
  readonly body: string;
  readonly publishedAt: string;
  readonly link: string;
}

export type FeedFormat = 'search_api' | 'rss';

// ============================================================
// DEDUP STORE
// ============================================================

export interface SeenEntry {
  id: string;
  deliveredAt: string;
  title?: string;
  publishedAt?: string;
}

/**
 * Persistent record of announcements already delivered.
 * `markSeen` on an existing id is a no-op.
 */
export interface DedupStore {
  has(id: string): Promise<boolean>;
  markSeen(entry: SeenEntry): Promise<void>;
}

// ============================================================
// DESTINATIONS
// ============================================================

export interface DestinationConfig {
  readonly endpointURL: string;
}

/**
 * Resolves the webhook destinations for one invocation.
 * Implementations hide the secret backend.
 */
export interface DestinationConfigProvider {
  getDestinations(): Promise<readonly DestinationConfig[]>;
}
