/**
 * ReleaseRelay — Relay Pipeline
 *
 * One invocation: load destinations, fetch and parse the feed, then for
 * each record check the dedup store, deliver, and commit.
 *
 * Commit policy: a record is marked seen only when EVERY destination
 * accepted it. A failure on one destination therefore re-sends the record
 * to all destinations on the next invocation, until all succeed. The
 * alternative (commit after the first success) could leave a destination
 * permanently without the announcement.
 */

import { nanoid } from 'nanoid';
import type {
  AnnouncementRecord,
  DedupStore,
  DestinationConfig,
  DestinationConfigProvider,
  FeedFormat,
  InvocationState,
  InvocationSummary,
  ProcessingOrder,
  RecordOutcome,
} from '../types';
import type { FeedSource } from '../feeds/base';
import { collectRecords } from '../feeds/base';
import type { Dispatcher } from '../delivery/dispatcher';
import {
  ConfigError,
  FetchError,
  ParseError,
  RelayError,
  StoreUnavailableError,
  errorMessage,
} from '../lib/errors';
import { logger, timeOperation, type Logger } from '../lib/logger';

// ============================================================
// CONFIGURATION
// ============================================================

export interface RelayPipelineDeps {
  /** Tried in order; later sources are fallbacks. */
  sources: FeedSource[];
  store: DedupStore;
  destinations: DestinationConfigProvider;
  dispatcher: Dispatcher;
}

export interface RelayPipelineOptions {
  processingOrder: ProcessingOrder;
  invocationTimeoutMs: number;
  /** Fetch, parse and check the store, but neither deliver nor commit. */
  dryRun?: boolean;
  now?: () => number;
}

interface InvocationContext {
  log: Logger;
  destinations: readonly DestinationConfig[];
  deadline: number;
  handled: Set<string>;
}

// ============================================================
// PIPELINE
// ============================================================

export class RelayPipeline {
  private current: InvocationState = 'IDLE';
  private readonly now: () => number;

  constructor(
    private readonly deps: RelayPipelineDeps,
    private readonly options: RelayPipelineOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get state(): InvocationState {
    return this.current;
  }

  /**
   * Run one invocation. Fetch, parse and config failures are rethrown;
   * per-record failures are reported in the summary.
   */
  async run(): Promise<InvocationSummary> {
    const invocationId = nanoid(12);
    const log = logger.child({ invocationId });
    const start = this.now();
    const dryRun = this.options.dryRun ?? false;

    log.info('Invocation started', { dryRun });

    try {
      this.transition('LOADING_CONFIG', log);
      const destinations = await this.loadDestinations();

      const { records, source } = await this.loadRecords(log);
      const ordered = this.options.processingOrder === 'oldest-first' ? [...records].reverse() : records;

      const ctx: InvocationContext = {
        log,
        destinations,
        deadline: start + this.options.invocationTimeoutMs,
        handled: new Set(),
      };

      const outcomes: RecordOutcome[] = [];
      for (const record of ordered) {
        outcomes.push(await this.processRecord(record, ctx, dryRun));
      }

      this.transition('DONE', log);

      const finished = this.now();
      const summary = summarize(outcomes, {
        invocationId,
        source,
        dryRun,
        startedAt: new Date(start).toISOString(),
        finishedAt: new Date(finished).toISOString(),
        durationMs: finished - start,
      });

      log.info('Invocation completed', {
        source,
        total: summary.total,
        delivered: summary.delivered,
        skipped: summary.skipped,
        failed: summary.failed,
        deferred: summary.deferred,
        previewed: summary.previewed,
        durationMs: summary.durationMs,
      });

      return summary;
    } catch (error) {
      this.transition('FAILED', log);
      log.error('Invocation failed', {
        error: errorMessage(error),
        code: error instanceof RelayError ? error.code : undefined,
      });
      throw error;
    }
  }

  // ============================================================
  // STAGES
  // ============================================================

  private async loadDestinations(): Promise<readonly DestinationConfig[]> {
    let destinations: readonly DestinationConfig[];
    try {
      destinations = await this.deps.destinations.getDestinations();
    } catch (error) {
      if (error instanceof ConfigError) throw error;
      throw new ConfigError(`Failed to load destinations: ${errorMessage(error)}`, [], { cause: error });
    }

    if (destinations.length === 0) {
      throw new ConfigError('No destinations configured');
    }
    return destinations;
  }

  /**
   * Fetch and fully parse the first source that works. The last
   * source's error is rethrown when every source fails.
   */
  private async loadRecords(
    log: Logger
  ): Promise<{ records: AnnouncementRecord[]; source: FeedFormat }> {
    let lastError: FetchError | ParseError | undefined;

    for (const source of this.deps.sources) {
      try {
        this.transition('FETCHING', log);
        const payload = await timeOperation('Feed fetch', () => source.fetch(), log);

        this.transition('PARSING', log);
        const records = await collectRecords(source.parse(payload));

        log.info('Feed parsed', { source: source.format, records: records.length });
        return { records, source: source.format };
      } catch (error) {
        if (!(error instanceof FetchError || error instanceof ParseError)) throw error;

        lastError = error;
        log.warn('Feed source failed', {
          source: source.format,
          code: error.code,
          error: error.message,
        });
      }
    }

    throw lastError ?? new ConfigError('No feed sources configured');
  }

  private async processRecord(
    record: AnnouncementRecord,
    ctx: InvocationContext,
    dryRun: boolean
  ): Promise<RecordOutcome> {
    const base = { recordId: record.id, title: record.title };
    const log = ctx.log.child({ recordId: record.id });

    // Records not started before the deadline wait for the next invocation
    if (this.now() >= ctx.deadline) {
      log.warn('Invocation deadline passed, deferring record');
      return { ...base, status: 'deferred' };
    }

    this.transition('PROCESSING', log);

    if (ctx.handled.has(record.id)) {
      log.debug('Duplicate entry within feed, skipping');
      return { ...base, status: 'skipped' };
    }
    ctx.handled.add(record.id);

    let seen: boolean;
    try {
      seen = await this.deps.store.has(record.id);
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      log.error('Dedup lookup failed', { error: error.message });
      return { ...base, status: 'failed', error: error.message };
    }

    if (seen) {
      log.debug('Already delivered, skipping');
      return { ...base, status: 'skipped' };
    }

    if (dryRun) {
      log.info('Dry run - would deliver', { title: record.title });
      return { ...base, status: 'previewed' };
    }

    this.transition('DELIVERING', log);
    const dispatch = await this.deps.dispatcher.dispatch(record, ctx.destinations);

    if (!dispatch.allDelivered) {
      const error = `${dispatch.failedCount} of ${ctx.destinations.length} destination(s) failed`;
      log.warn('Partial delivery, record left unmarked', {
        delivered: dispatch.deliveredCount,
        failed: dispatch.failedCount,
      });
      return { ...base, status: 'failed', dispatch, error };
    }

    this.transition('COMMITTING', log);
    try {
      await this.deps.store.markSeen({
        id: record.id,
        deliveredAt: new Date(this.now()).toISOString(),
        title: record.title,
        publishedAt: record.publishedAt,
      });
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      log.error('Delivered but commit failed; record will be re-sent', { error: error.message });
      return { ...base, status: 'failed', dispatch, error: error.message };
    }

    log.info('Announcement delivered', { title: record.title, destinations: dispatch.deliveredCount });
    return { ...base, status: 'delivered', dispatch };
  }

  private transition(next: InvocationState, log: Logger): void {
    log.debug('State transition', { from: this.current, to: next });
    this.current = next;
  }
}

// ============================================================
// SUMMARY
// ============================================================

function summarize(
  records: RecordOutcome[],
  meta: Pick<InvocationSummary, 'invocationId' | 'source' | 'dryRun' | 'startedAt' | 'finishedAt' | 'durationMs'>
): InvocationSummary {
  const count = (status: RecordOutcome['status']) => records.filter(r => r.status === status).length;

  return {
    ...meta,
    state: 'DONE',
    total: records.length,
    delivered: count('delivered'),
    skipped: count('skipped'),
    failed: count('failed'),
    deferred: count('deferred'),
    previewed: count('previewed'),
    records,
  };
}
