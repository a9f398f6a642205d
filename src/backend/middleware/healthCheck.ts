/**
 * Health check endpoints for liveness and readiness probes.
 *
 * GET /live   - the process is up
 * GET /ready  - the service can take traffic
 *
 * Both answer 200 { status: 'ok' } or 503 { status: 'unavailable' }.
 */

import { Router, type Response } from 'express';
import { asyncHandler } from './errorHandler';

export type Probe = () => boolean | Promise<boolean>;

export interface HealthCheckOptions {
  liveness?: Probe;
  readiness?: Probe;
}

export const LIVENESS_PATH = '/live';
export const READINESS_PATH = '/ready';

const alwaysUp: Probe = () => true;

async function respond(res: Response, probe: Probe): Promise<void> {
  const up = await probe();
  res.status(up ? 200 : 503).json({ status: up ? 'ok' : 'unavailable' });
}

export function healthCheck(options: HealthCheckOptions = {}): Router {
  const liveness = options.liveness ?? alwaysUp;
  const readiness = options.readiness ?? alwaysUp;
  const router = Router();

  router.get(LIVENESS_PATH, asyncHandler((_req, res) => respond(res, liveness)));
  router.get(READINESS_PATH, asyncHandler((_req, res) => respond(res, readiness)));

  return router;
}

/**
 * Whether a request targets one of the probe endpoints
 */
export function isHealthCheckPath(path: string): boolean {
  return path === LIVENESS_PATH || path === READINESS_PATH;
}
