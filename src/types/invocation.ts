/**
 * ReleaseRelay — Invocation Types
 *
 * Delivery outcomes and the summary returned by one pipeline run.
 */

import type { DeliveryFailureReason } from '../lib/errors';
import type { FeedFormat } from './announcement';

export type InvocationState =
  | 'IDLE'
  | 'LOADING_CONFIG'
  | 'FETCHING'
  | 'PARSING'
  | 'PROCESSING'
  | 'DELIVERING'
  | 'COMMITTING'
  | 'DONE'
  | 'FAILED';

export type ProcessingOrder = 'oldest-first' | 'source';

// ============================================================
// DELIVERY RESULTS
// ============================================================

export interface DestinationOutcome {
  /** Position of the destination in the configured list. */
  index: number;
  /** Redacted form of the webhook URL, safe to log. */
  destination: string;
  delivered: boolean;
  status?: number;
  reason?: DeliveryFailureReason;
  error?: string;
}

/**
 * Result of sending one record to every destination.
 * Destinations are attempted independently, so any mix of outcomes is possible.
 */
export interface DispatchResult {
  recordId: string;
  outcomes: DestinationOutcome[];
  allDelivered: boolean;
  deliveredCount: number;
  failedCount: number;
}

// ============================================================
// SUMMARY
// ============================================================

export type RecordStatus = 'delivered' | 'skipped' | 'failed' | 'deferred' | 'previewed';

export interface RecordOutcome {
  recordId: string;
  title: string;
  status: RecordStatus;
  /** Present for records that reached delivery. */
  dispatch?: DispatchResult;
  error?: string;
}

export interface InvocationSummary {
  invocationId: string;
  state: 'DONE';
  source: FeedFormat;
  dryRun: boolean;
  total: number;
  delivered: number;
  skipped: number;
  failed: number;
  deferred: number;
  previewed: number;
  records: RecordOutcome[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}
