/**
 * Health Reporter
 *
 * Pure rendering of an aggregate report into an HTTP status, headers and body
 */

import { errorMessage } from '../error-handling/errors.js';
import type {
  AggregateReport,
  CheckOutcome,
  HealthCheckBody,
  KindFilter,
  OverallStatus,
  RenderedReport,
} from './types.js';

export interface RenderOptions {
  /** Sent as Retry-After on 503 readiness responses */
  retryAfterSeconds?: number;
}

export function statusCodeFor(overall: OverallStatus): 200 | 503 {
  return overall === 'unhealthy' ? 503 : 200;
}

function renderCheck(outcome: CheckOutcome): HealthCheckBody {
  return {
    name: outcome.name,
    kind: outcome.kind,
    status: outcome.status,
    ...(outcome.status !== 'healthy' && outcome.reason ? { reason: outcome.reason } : {}),
    ...(outcome.status === 'healthy' && outcome.message ? { message: outcome.message } : {}),
    latency_ms: Math.max(0, Math.round(outcome.latencyMs)),
  };
}

function renderHeaders(filter: KindFilter, statusCode: 200 | 503, options: RenderOptions): Record<string, string> {
  const headers: Record<string, string> = { 'Cache-Control': 'no-store' };
  if (statusCode === 503 && filter === 'readiness' && options.retryAfterSeconds !== undefined) {
    headers['Retry-After'] = String(options.retryAfterSeconds);
  }
  return headers;
}

export function renderReport(report: AggregateReport, options: RenderOptions = {}): RenderedReport {
  const statusCode = statusCodeFor(report.overall);

  return {
    statusCode,
    headers: renderHeaders(report.filter, statusCode, options),
    body: {
      overall: report.overall,
      ...(report.service ? { service: report.service } : {}),
      ...(report.version ? { version: report.version } : {}),
      timestamp: report.generatedAt.toISOString(),
      checks: report.outcomes.map(renderCheck),
    },
  };
}

/**
 * Well-formed 503 for the case where the checker itself failed to produce a report
 */
export function renderFailure(
  filter: KindFilter,
  error: unknown,
  identity: { service?: string; version?: string } = {},
  options: RenderOptions = {}
): RenderedReport {
  return {
    statusCode: 503,
    headers: renderHeaders(filter, 503, options),
    body: {
      overall: 'unhealthy',
      ...(identity.service ? { service: identity.service } : {}),
      ...(identity.version ? { version: identity.version } : {}),
      timestamp: new Date().toISOString(),
      checks: [
        {
          name: 'health-check',
          kind: 'liveness',
          status: 'unhealthy',
          reason: errorMessage(error),
          latency_ms: 0,
        },
      ],
    },
  };
}
