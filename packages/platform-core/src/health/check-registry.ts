/**
 * Health Check Registry
 *
 * Mutable accumulation of named checks. build() moves the registered checks
 * into an immutable HealthChecker and leaves the registry empty.
 */

import { HealthChecker } from './health-checker.js';
import { FunctionProbe } from './probes/base-probe.js';
import { assertCheckName, parseCheckOptions } from './check-validation.js';
import { parseHealthCheckerConfig, type HealthCheckerConfigInput } from '../config/health-config.js';
import { getLogger } from '../logging/logger.js';
import type { CheckKind, CheckOptions, HealthProbe, ProbeFn, RegisteredCheck } from './types.js';

const logger = getLogger('health:registry');

export class HealthCheckRegistry {
  private readonly checks = new Map<string, RegisteredCheck>();

  /**
   * Register a probe under a unique, case-sensitive name. Performs no I/O.
   */
  add(name: string, kind: CheckKind, probe: HealthProbe | ProbeFn, options: CheckOptions = {}): this {
    assertCheckName(name, this.checks);
    const { timeoutMs } = parseCheckOptions(name, options);

    this.checks.set(name, {
      name,
      kind,
      probe: typeof probe === 'function' ? new FunctionProbe(probe) : probe,
      timeoutMs,
    });
    logger.debug('Health check registered', { name, kind, timeoutMs });
    return this;
  }

  has(name: string): boolean {
    return this.checks.has(name);
  }

  get size(): number {
    return this.checks.size;
  }

  /**
   * An empty registry builds a checker that always reports healthy.
   */
  build(config: HealthCheckerConfigInput = {}): HealthChecker {
    const parsedConfig = parseHealthCheckerConfig(config);
    const checks = Array.from(this.checks.values());
    this.checks.clear();
    return new HealthChecker(checks, parsedConfig);
  }
}

export function createHealthCheckRegistry(): HealthCheckRegistry {
  return new HealthCheckRegistry();
}
