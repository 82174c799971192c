/**
 * ReleaseRelay — Trigger Server
 *
 * Minimal Express server for schedulers that invoke over HTTP instead of
 * running the CLI.
 *
 * Endpoints:
 * - POST /invoke  — run one invocation (Bearer token required)
 * - GET /health   — health check for monitoring
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import crypto from 'crypto';
import type { InvocationSummary } from '../types';
import { RelayError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'trigger-server' });

export interface TriggerServerOptions {
  /** Shared secret expected as `Authorization: Bearer <token>`. */
  token?: string;
  runInvocation: () => Promise<InvocationSummary>;
}

// ============================================================
// AUTHORIZATION
// ============================================================

/**
 * Compare a bearer header against the expected token in constant time.
 */
export function verifyBearerToken(header: string | undefined, token: string): boolean {
  if (!header) return false;

  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  if (!match) return false;

  // Hash both sides so the comparison runs on equal-length buffers
  const given = crypto.createHash('sha256').update(match[1]).digest();
  const expected = crypto.createHash('sha256').update(token).digest();
  return crypto.timingSafeEqual(given, expected);
}

// ============================================================
// EXPRESS APP
// ============================================================

export function createTriggerApp(options: TriggerServerOptions): Express {
  const app = express();
  let running = false;

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'release-relay-trigger',
      running,
    });
  });

  app.post('/invoke', async (req: Request, res: Response, next: NextFunction) => {
    if (!options.token) {
      log.error('TRIGGER_TOKEN not configured');
      res.status(500).json({ error: 'Trigger token not configured' });
      return;
    }

    if (!verifyBearerToken(req.headers.authorization, options.token)) {
      log.warn('Rejected trigger with invalid token');
      res.status(401).json({ error: 'Invalid token' });
      return;
    }

    if (running) {
      res.status(409).json({ error: 'Invocation already in progress' });
      return;
    }

    running = true;
    try {
      const summary = await options.runInvocation();
      res.status(200).json(summary);
    } catch (error) {
      if (error instanceof RelayError) {
        res.status(500).json({ error: error.message, code: error.code });
        return;
      }
      next(error);
    } finally {
      running = false;
    }
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    log.error('Unhandled error in trigger server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export function startServer(app: Express, port: number): void {
  app.listen(port, () => {
    log.info(`Trigger server listening on port ${port}`);
    console.log(`ReleaseRelay trigger server started on http://localhost:${port}`);
    console.log('Endpoints:');
    console.log(`  GET  /health - Health check`);
    console.log(`  POST /invoke - Run one invocation`);
  });
}
