import { errorMessage } from '../../error-handling/errors.js';
import type { HealthProbe, ProbeFn, ProbeResult } from '../types.js';

export function healthy(message?: string): ProbeResult {
  return message ? { status: 'healthy', message } : { status: 'healthy' };
}

export function unhealthy(reason: string): ProbeResult {
  return { status: 'unhealthy', reason: reason.trim() || 'unknown error' };
}

export function normalizeProbeResult(value: ProbeResult | boolean): ProbeResult {
  if (typeof value === 'boolean') {
    return value ? healthy() : unhealthy('check reported failure');
  }
  return value.status === 'healthy' ? healthy(value.message) : unhealthy(value.reason);
}

/**
 * Probes subclass this and implement performCheck; anything it throws is
 * reported as an unhealthy result.
 */
export abstract class BaseProbe implements HealthProbe {
  abstract readonly type: string;

  async check(): Promise<ProbeResult> {
    try {
      return normalizeProbeResult(await this.performCheck());
    } catch (error) {
      return unhealthy(this.describeFailure(error));
    }
  }

  protected abstract performCheck(): Promise<ProbeResult>;

  protected describeFailure(error: unknown): string {
    return errorMessage(error);
  }
}

/**
 * Wraps a closure for dependencies without a dedicated probe
 */
export class FunctionProbe extends BaseProbe {
  constructor(
    private readonly fn: ProbeFn,
    readonly type: string = 'custom'
  ) {
    super();
  }

  protected async performCheck(): Promise<ProbeResult> {
    return normalizeProbeResult(await this.fn());
  }
}

export function createFunctionProbe(fn: ProbeFn, type?: string): HealthProbe {
  return new FunctionProbe(fn, type);
}
