/**
 * ReleaseRelay — Trigger Server Script
 *
 * Usage:
 *   npm run server
 *
 * An external scheduler then POSTs to /invoke once per interval.
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { CachedDestinationConfigProvider, EnvDestinationConfigProvider } from '../src/destinations/provider';
import { createRelayPipeline } from '../src/pipeline';
import { createTriggerApp, startServer } from '../src/server/trigger';

function main(): void {
  const config = loadConfig();

  if (!config.trigger.token) {
    console.error('ERROR: TRIGGER_TOKEN environment variable is required');
    process.exit(1);
  }

  // Long-lived process: avoid re-reading the secret on every trigger
  const destinations = new CachedDestinationConfigProvider(
    new EnvDestinationConfigProvider(config.destinationsSecret),
    config.destinationsCacheTtlMs
  );

  const pipeline = createRelayPipeline(config, { destinations });

  const app = createTriggerApp({
    token: config.trigger.token,
    runInvocation: () => pipeline.run(),
  });

  startServer(app, config.trigger.port);
}

try {
  main();
} catch (error) {
  console.error('Failed to start trigger server:', errorMessage(error));
  process.exit(1);
}
