/**
 * ReleaseRelay — Pipeline Module
 *
 * Wires configuration into a ready-to-run RelayPipeline.
 */

import type { RelayConfig } from '../lib/config';
import type { DedupStore, DestinationConfigProvider } from '../types';
import { createFeedSources } from '../feeds';
import { createDedupStore } from '../dedup';
import { EnvDestinationConfigProvider } from '../destinations/provider';
import { Dispatcher } from '../delivery';
import { RelayPipeline } from './relay';

export { RelayPipeline, type RelayPipelineDeps, type RelayPipelineOptions } from './relay';
export { parseScheduledRunArgs, type ScheduledRunOptions } from './run-options';

export interface CreatePipelineOverrides {
  store?: DedupStore;
  destinations?: DestinationConfigProvider;
  dryRun?: boolean;
}

export function createRelayPipeline(
  config: RelayConfig,
  overrides: CreatePipelineOverrides = {}
): RelayPipeline {
  return new RelayPipeline(
    {
      sources: createFeedSources(config),
      store: overrides.store ?? createDedupStore(config),
      destinations: overrides.destinations ?? new EnvDestinationConfigProvider(config.destinationsSecret),
      dispatcher: new Dispatcher({
        concurrency: config.deliveryConcurrency,
        timeoutMs: config.fetchTimeoutMs,
      }),
    },
    {
      processingOrder: config.processingOrder,
      invocationTimeoutMs: config.invocationTimeoutMs,
      dryRun: overrides.dryRun,
    }
  );
}
