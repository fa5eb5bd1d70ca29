import { BaseProbe, healthy, unhealthy } from './base-probe.js';
import type { ProbeResult } from '../types.js';

export interface ProcessProbeOptions {
  maxHeapUsedBytes?: number;
  memoryUsage?: () => NodeJS.MemoryUsage;
}

/**
 * Local liveness probe; no I/O
 */
export class ProcessProbe extends BaseProbe {
  readonly type = 'process';
  private readonly memoryUsage: () => NodeJS.MemoryUsage;

  constructor(private readonly options: ProcessProbeOptions = {}) {
    super();
    this.memoryUsage = options.memoryUsage ?? (() => process.memoryUsage());
  }

  protected async performCheck(): Promise<ProbeResult> {
    const { maxHeapUsedBytes } = this.options;
    if (maxHeapUsedBytes === undefined) {
      return healthy();
    }

    const { heapUsed } = this.memoryUsage();
    if (heapUsed > maxHeapUsedBytes) {
      return unhealthy(`heap used ${heapUsed} bytes exceeds limit ${maxHeapUsedBytes}`);
    }
    return healthy();
  }
}

export function createProcessProbe(options?: ProcessProbeOptions): ProcessProbe {
  return new ProcessProbe(options);
}
