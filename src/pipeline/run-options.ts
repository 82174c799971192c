/**
 * ReleaseRelay — Scheduled Run Options
 */

import { ConfigError } from '../lib/errors';

export interface ScheduledRunOptions {
  dryRun: boolean;
  memoryStore: boolean;
}

/**
 * Parse the scheduled-run flags. The in-memory store forgets every
 * delivery, so it is only accepted for dry runs.
 */
export function parseScheduledRunArgs(args: readonly string[]): ScheduledRunOptions {
  const options: ScheduledRunOptions = {
    dryRun: args.includes('--dry-run'),
    memoryStore: args.includes('--memory-store'),
  };

  if (options.memoryStore && !options.dryRun) {
    throw new ConfigError('--memory-store requires --dry-run', ['--memory-store']);
  }

  return options;
}
