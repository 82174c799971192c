/**
 * ReleaseRelay — Type Exports
 *
 * Re-exports all types from the types module.
 */

export type {
  AnnouncementRecord,
  FeedFormat,
  SeenEntry,
  DedupStore,
  DestinationConfig,
  DestinationConfigProvider,
} from './announcement';

export type {
  InvocationState,
  ProcessingOrder,
  DestinationOutcome,
  DispatchResult,
  RecordStatus,
  RecordOutcome,
  InvocationSummary,
} from './invocation';
