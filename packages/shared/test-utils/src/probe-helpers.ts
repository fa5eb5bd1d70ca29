import type { HealthProbe, ProbeResult } from '@healthmesh/platform-core';

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface ScriptedProbe extends HealthProbe {
  readonly calls: number;
}

/**
 * Probe that resolves with a fixed result after a fixed delay
 */
export function createScriptedProbe(result: ProbeResult, delayMs = 0): ScriptedProbe {
  let calls = 0;
  return {
    type: 'scripted',
    get calls() {
      return calls;
    },
    async check() {
      calls += 1;
      if (delayMs > 0) await delay(delayMs);
      return result;
    },
  };
}

/**
 * Probe whose check never settles
 */
export function createHangingProbe(): HealthProbe {
  return {
    type: 'hanging',
    check: () => new Promise<ProbeResult>(() => undefined),
  };
}

/**
 * Probe that breaks the no-throw contract
 */
export function createThrowingProbe(error: unknown, delayMs = 0): HealthProbe {
  return {
    type: 'throwing',
    async check(): Promise<ProbeResult> {
      if (delayMs > 0) await delay(delayMs);
      throw error;
    },
  };
}
