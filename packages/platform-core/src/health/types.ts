/**
 * Health Check Types
 *
 * Check kinds, probe results, per-check outcomes and the aggregate report
 */

/**
 * Liveness checks decide restarts, readiness checks decide traffic admission.
 * A `both` check takes part in each decision.
 */
export type CheckKind = 'liveness' | 'readiness' | 'both';

export type KindFilter = 'all' | 'liveness' | 'readiness';

export type CheckStatus = 'healthy' | 'unhealthy' | 'timed_out';

export type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * lenient: a failing readiness check degrades the service.
 * strict: a failing readiness check makes it unhealthy.
 */
export type MergePolicy = 'lenient' | 'strict';

export type ProbeResult = { status: 'healthy'; message?: string } | { status: 'unhealthy'; reason: string };

/**
 * A single round-trip to one dependency. Implementations capture their own
 * backend handle and resolve with a result instead of throwing.
 */
export interface HealthProbe {
  readonly type: string;
  check(): Promise<ProbeResult>;
}

export type ProbeFn = () => Promise<ProbeResult | boolean> | ProbeResult | boolean;

export interface CheckOptions {
  /** Overrides the checker's per-check timeout */
  timeoutMs?: number;
}

export interface RegisteredCheck {
  readonly name: string;
  readonly kind: CheckKind;
  readonly probe: HealthProbe;
  readonly timeoutMs?: number;
}

export interface CheckOutcome {
  readonly name: string;
  readonly kind: CheckKind;
  readonly status: CheckStatus;
  /** Present for unhealthy and timed_out outcomes */
  readonly reason?: string;
  /** Optional detail reported by a healthy probe */
  readonly message?: string;
  readonly latencyMs: number;
}

export interface AggregateReport {
  readonly overall: OverallStatus;
  readonly filter: KindFilter;
  readonly outcomes: readonly CheckOutcome[];
  readonly generatedAt: Date;
  readonly durationMs: number;
  readonly service?: string;
  readonly version?: string;
}

export interface HealthCheckBody {
  name: string;
  kind: CheckKind;
  status: CheckStatus;
  reason?: string;
  message?: string;
  latency_ms: number;
}

export interface HealthReportBody {
  overall: OverallStatus;
  service?: string;
  version?: string;
  timestamp: string;
  checks: HealthCheckBody[];
}

export interface RenderedReport {
  statusCode: 200 | 503;
  headers: Record<string, string>;
  body: HealthReportBody;
}
