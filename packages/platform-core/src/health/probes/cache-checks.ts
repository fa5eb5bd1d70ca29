/**
 * Cache Health Checks
 *
 * Key-value store probe issuing a single PING
 */

import { BaseProbe, healthy, unhealthy } from './base-probe.js';
import { errorMessage } from '../../error-handling/errors.js';
import type { ProbeResult } from '../types.js';

/**
 * Satisfied by an ioredis `Redis` or `Cluster`
 */
export interface PingableCache {
  ping(): Promise<string>;
}

export class CacheProbe extends BaseProbe {
  readonly type = 'cache';

  constructor(private readonly cache: PingableCache) {
    super();
  }

  protected async performCheck(): Promise<ProbeResult> {
    const reply = await this.cache.ping();
    if (reply !== 'PONG') {
      return unhealthy(`unexpected PING reply: ${reply}`);
    }
    return healthy();
  }

  protected describeFailure(error: unknown): string {
    return `ping failed: ${errorMessage(error)}`;
  }
}

export function createCacheProbe(cache: PingableCache): CacheProbe {
  return new CacheProbe(cache);
}
