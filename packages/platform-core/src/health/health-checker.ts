/**
 * Health Checker
 *
 * Frozen check aggregator. Each run fans out to every selected probe at once,
 * bounds each probe by its own timeout and the whole round by the global
 * timeout, and merges the outcomes into one overall status. A checker holds
 * no per-run state, so one instance can serve any number of concurrent runs.
 */

import { createDeadline } from './deadline.js';
import { assertCheckName, parseCheckOptions } from './check-validation.js';
import { matchesFilter, mergeOutcomes } from './merge-policy.js';
import { normalizeProbeResult, unhealthy } from './probes/base-probe.js';
import { errorMessage } from '../error-handling/errors.js';
import { getLogger } from '../logging/logger.js';
import {
  parseHealthCheckerConfig,
  type HealthCheckerConfig,
  type HealthCheckerConfigInput,
} from '../config/health-config.js';
import type { AggregateReport, CheckOutcome, KindFilter, ProbeResult, RegisteredCheck } from './types.js';

const logger = getLogger('health:checker');

const CHECK_TIMED_OUT = Symbol('check-timed-out');
const ROUND_EXPIRED = Symbol('round-expired');

async function invokeProbe(check: RegisteredCheck): Promise<ProbeResult> {
  try {
    return normalizeProbeResult(await check.probe.check());
  } catch (error) {
    return unhealthy(errorMessage(error));
  }
}

function timedOutOutcome(check: RegisteredCheck, latencyMs: number, reason: string): CheckOutcome {
  return Object.freeze({ name: check.name, kind: check.kind, status: 'timed_out', reason, latencyMs });
}

export class HealthChecker {
  private readonly checks: readonly RegisteredCheck[];
  readonly config: Readonly<HealthCheckerConfig>;

  /**
   * Usually reached through HealthCheckRegistry.build(). Direct callers get the
   * same name, timeout and config validation.
   */
  constructor(checks: readonly RegisteredCheck[], config: HealthCheckerConfigInput = {}) {
    const names = new Set<string>();
    for (const check of checks) {
      assertCheckName(check.name, names);
      parseCheckOptions(check.name, { timeoutMs: check.timeoutMs });
      names.add(check.name);
    }

    this.checks = Object.freeze(checks.map(check => Object.freeze({ ...check })));
    this.config = Object.freeze(parseHealthCheckerConfig(config));
  }

  /** Registered check names in registration order */
  get checkNames(): string[] {
    return this.checks.map(check => check.name);
  }

  async run(filter: KindFilter = 'all'): Promise<AggregateReport> {
    const startedAt = Date.now();
    const selected = this.checks.filter(check => matchesFilter(check.kind, filter));

    if (selected.length === 0) {
      return this.createReport(filter, [], startedAt);
    }

    const abandoned: string[] = [];
    const round = createDeadline(this.config.globalTimeoutMs);
    // Promise.all keeps registration order whatever the completion order
    const outcomes = await Promise.all(
      selected.map(check => this.executeCheck(check, round.expired, abandoned))
    ).finally(() => round.cancel());

    if (abandoned.length > 0) {
      logger.warn('Global health check timeout elapsed', {
        globalTimeoutMs: this.config.globalTimeoutMs,
        abandoned,
      });
    }

    return this.createReport(filter, outcomes, startedAt);
  }

  /**
   * Never rejects. Settles with the probe result, or as timed_out once the
   * check's own timeout or the round deadline passes; a later probe result
   * is dropped.
   */
  private async executeCheck(
    check: RegisteredCheck,
    roundExpired: Promise<void>,
    abandoned: string[]
  ): Promise<CheckOutcome> {
    const timeoutMs = check.timeoutMs ?? this.config.perCheckTimeoutMs;
    const startedAt = Date.now();
    const timeout = createDeadline(timeoutMs);

    try {
      const result = await Promise.race([
        invokeProbe(check),
        timeout.expired.then((): typeof CHECK_TIMED_OUT => CHECK_TIMED_OUT),
        roundExpired.then((): typeof ROUND_EXPIRED => ROUND_EXPIRED),
      ]);
      const latencyMs = Date.now() - startedAt;

      if (result === CHECK_TIMED_OUT) {
        return timedOutOutcome(check, latencyMs, `no response within ${timeoutMs}ms`);
      }
      if (result === ROUND_EXPIRED) {
        abandoned.push(check.name);
        return timedOutOutcome(check, latencyMs, `abandoned after global timeout of ${this.config.globalTimeoutMs}ms`);
      }
      if (result.status === 'healthy') {
        return Object.freeze({
          name: check.name,
          kind: check.kind,
          status: 'healthy',
          ...(result.message ? { message: result.message } : {}),
          latencyMs,
        });
      }
      return Object.freeze({
        name: check.name,
        kind: check.kind,
        status: 'unhealthy',
        reason: result.reason,
        latencyMs,
      });
    } finally {
      timeout.cancel();
    }
  }

  private createReport(filter: KindFilter, outcomes: CheckOutcome[], startedAt: number): AggregateReport {
    const overall = mergeOutcomes(outcomes, this.config.mergePolicy);

    for (const outcome of outcomes) {
      if (outcome.status !== 'healthy') {
        logger.warn('Health check failed', {
          name: outcome.name,
          status: outcome.status,
          reason: outcome.reason,
          latencyMs: outcome.latencyMs,
        });
      }
    }

    const report: AggregateReport = {
      overall,
      filter,
      outcomes: Object.freeze(outcomes),
      generatedAt: new Date(),
      durationMs: Date.now() - startedAt,
      ...(this.config.serviceName ? { service: this.config.serviceName } : {}),
      ...(this.config.version ? { version: this.config.version } : {}),
    };

    logger.debug('Health checks completed', {
      filter,
      overall,
      checks: outcomes.length,
      durationMs: report.durationMs,
    });

    return Object.freeze(report);
  }
}
