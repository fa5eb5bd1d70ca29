/**
 * Health Routes
 *
 * Express mount for a HealthChecker:
 * - GET /       - Full report (all checks)
 * - GET /live   - Liveness probe (is the process running?)
 * - GET /ready  - Readiness probe (can the service handle traffic?)
 */

import { Router, type Request, type Response } from 'express';
import type { HealthChecker } from './health-checker.js';
import { renderFailure, renderReport } from './reporter.js';
import { serializeError } from '../logging/error-serializer.js';
import { getLogger } from '../logging/logger.js';
import type { KindFilter, RenderedReport } from './types.js';

const logger = getLogger('health:routes');

export interface HealthRouterOptions {
  paths?: {
    full?: string;
    liveness?: string;
    readiness?: string;
  };
}

function send(res: Response, rendered: RenderedReport): void {
  res.set(rendered.headers);
  res.status(rendered.statusCode).json(rendered.body);
}

/**
 * Request handler running the checker with one kind filter
 */
export function createHealthEndpoint(checker: HealthChecker, filter: KindFilter) {
  const { serviceName, version, retryAfterSeconds } = checker.config;

  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const report = await checker.run(filter);
      send(res, renderReport(report, { retryAfterSeconds }));
    } catch (error) {
      logger.error('Health check run failed', { filter, error: serializeError(error) });
      send(res, renderFailure(filter, error, { service: serviceName, version }, { retryAfterSeconds }));
    }
  };
}

export function createHealthRouter(checker: HealthChecker, options: HealthRouterOptions = {}): Router {
  const router = Router();

  router.get(options.paths?.full ?? '/', createHealthEndpoint(checker, 'all'));
  router.get(options.paths?.liveness ?? '/live', createHealthEndpoint(checker, 'liveness'));
  router.get(options.paths?.readiness ?? '/ready', createHealthEndpoint(checker, 'readiness'));

  return router;
}
