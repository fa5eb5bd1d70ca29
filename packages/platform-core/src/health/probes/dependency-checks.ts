/**
 * Dependency Health Checks
 *
 * Downstream HTTP service probe
 */

import axios from 'axios';
import { BaseProbe, healthy, unhealthy } from './base-probe.js';
import { DEFAULT_PER_CHECK_TIMEOUT_MS } from '../../config/health-config.js';
import type { ProbeResult } from '../types.js';

export interface HttpProbeOptions {
  expectedStatus?: number;
  /**
   * Aborts the request and frees its socket; defaults to the default per-check
   * timeout. Keep it at or below the check's timeout so abandoned runs leave no
   * connection open.
   */
  requestTimeoutMs?: number;
  headers?: Record<string, string>;
}

export class HttpProbe extends BaseProbe {
  readonly type = 'http';
  private readonly expectedStatus: number;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly url: string,
    private readonly options: HttpProbeOptions = {}
  ) {
    super();
    this.expectedStatus = options.expectedStatus ?? 200;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_PER_CHECK_TIMEOUT_MS;
  }

  protected async performCheck(): Promise<ProbeResult> {
    const response = await axios.get(this.url, {
      timeout: this.requestTimeoutMs,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
      headers: {
        'User-Agent': 'healthmesh-probe/1.0',
        Accept: 'application/json, text/plain, */*',
        'Cache-Control': 'no-cache',
        ...this.options.headers,
      },
      validateStatus: () => true,
    });

    if (response.status !== this.expectedStatus) {
      return unhealthy(`expected status ${this.expectedStatus}, got ${response.status}`);
    }
    return healthy(`HTTP ${response.status} OK`);
  }
}

export function createHttpProbe(url: string, options?: HttpProbeOptions): HttpProbe {
  return new HttpProbe(url, options);
}
