/**
 * ReleaseRelay — Scheduled Run Script
 *
 * Runs one invocation of the relay pipeline and exits.
 * Designed to be called by an external cron job or workflow scheduler.
 *
 * Usage (--memory-store is only accepted together with --dry-run):
 *   npm run scheduled                          # Deliver new announcements
 *   npm run scheduled -- --dry-run             # Preview without sending or recording
 *   npm run scheduled -- --dry-run --memory-store   # Preview without a database
 *
 * Cron Setup (every 5 minutes):
 *   0-59/5 * * * * cd /path/to/release-relay && npm run scheduled >> /var/log/release-relay.log 2>&1
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { loadConfig } from '../src/lib/config';
import { errorMessage, RelayError } from '../src/lib/errors';
import { InMemoryDedupStore } from '../src/dedup';
import { createRelayPipeline, parseScheduledRunArgs } from '../src/pipeline';

async function scheduledRun(): Promise<number> {
  try {
    const options = parseScheduledRunArgs(process.argv.slice(2));
    const config = loadConfig();
    const pipeline = createRelayPipeline(config, {
      dryRun: options.dryRun,
      store: options.memoryStore ? new InMemoryDedupStore() : undefined,
    });

    const summary = await pipeline.run();

    console.log('\n' + '='.repeat(60));
    console.log('RELEASE RELAY RUN COMPLETE');
    console.log('='.repeat(60));
    console.log(`Source:    ${summary.source}`);
    console.log(`Dry Run:   ${summary.dryRun}`);
    console.log(`Records:   ${summary.total}`);
    console.log(`Delivered: ${summary.delivered}`);
    console.log(`Skipped:   ${summary.skipped}`);
    console.log(`Failed:    ${summary.failed}`);
    console.log(`Deferred:  ${summary.deferred}`);
    if (summary.dryRun) {
      console.log(`Previewed: ${summary.previewed}`);
      for (const record of summary.records.filter(r => r.status === 'previewed')) {
        console.log(`  • ${record.title}`);
      }
    }
    console.log(`Duration:  ${summary.durationMs}ms`);
    console.log('='.repeat(60) + '\n');

    // Failed records are retried next cycle, but the scheduler should see them
    return summary.failed > 0 ? 1 : 0;
  } catch (error) {
    logger.error('Scheduled run failed', {
      error: errorMessage(error),
      code: error instanceof RelayError ? error.code : undefined,
    });
    console.error('\nScheduled run failed:', errorMessage(error));
    return 1;
  }
}

scheduledRun().then(code => {
  process.exitCode = code;
});
