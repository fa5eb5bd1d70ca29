/**
 * Status merge rules for a set of check outcomes
 */

import type { CheckKind, CheckOutcome, KindFilter, MergePolicy, OverallStatus } from './types.js';

export function countsForLiveness(kind: CheckKind): boolean {
  return kind === 'liveness' || kind === 'both';
}

export function countsForReadiness(kind: CheckKind): boolean {
  return kind === 'readiness' || kind === 'both';
}

export function matchesFilter(kind: CheckKind, filter: KindFilter): boolean {
  switch (filter) {
    case 'all':
      return true;
    case 'liveness':
      return countsForLiveness(kind);
    case 'readiness':
      return countsForReadiness(kind);
  }
}

export function isFailure(outcome: CheckOutcome): boolean {
  return outcome.status !== 'healthy';
}

/**
 * Liveness failures outrank readiness failures. A `both` check is evaluated
 * under each rule, so its failure always yields unhealthy.
 */
export function mergeOutcomes(outcomes: readonly CheckOutcome[], policy: MergePolicy): OverallStatus {
  if (outcomes.some(outcome => countsForLiveness(outcome.kind) && isFailure(outcome))) {
    return 'unhealthy';
  }
  if (outcomes.some(outcome => countsForReadiness(outcome.kind) && isFailure(outcome))) {
    return policy === 'strict' ? 'unhealthy' : 'degraded';
  }
  return 'healthy';
}
