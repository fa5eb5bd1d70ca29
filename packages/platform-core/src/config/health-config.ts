/**
 * Health Checker Configuration
 *
 * Build-time settings for the check aggregator, validated with zod and
 * optionally sourced from environment variables.
 */

import { z, type ZodIssue } from 'zod';
import { HealthConfigError } from '../health/errors.js';

export const DEFAULT_GLOBAL_TIMEOUT_MS = 5000;
export const DEFAULT_PER_CHECK_TIMEOUT_MS = 2000;

const timeoutMsSchema = z.number().int().positive();
const mergePolicySchema = z.enum(['lenient', 'strict']);

export const healthCheckerConfigSchema = z.object({
  serviceName: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  globalTimeoutMs: timeoutMsSchema.default(DEFAULT_GLOBAL_TIMEOUT_MS),
  perCheckTimeoutMs: timeoutMsSchema.default(DEFAULT_PER_CHECK_TIMEOUT_MS),
  mergePolicy: mergePolicySchema.default('lenient'),
  retryAfterSeconds: z.number().int().positive().optional(),
});

export type HealthCheckerConfigInput = z.input<typeof healthCheckerConfigSchema>;
export type HealthCheckerConfig = z.output<typeof healthCheckerConfigSchema>;

export const checkOptionsSchema = z.object({
  timeoutMs: timeoutMsSchema.optional(),
});

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function parseHealthCheckerConfig(input: HealthCheckerConfigInput = {}): HealthCheckerConfig {
  const result = healthCheckerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new HealthConfigError('Invalid health checker configuration', formatIssues(result.error.issues));
  }
  return result.data;
}

const unsetWhenEmpty = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(unsetWhenEmpty, z.string().optional());
const optionalPositiveInt = z.preprocess(unsetWhenEmpty, z.coerce.number().int().positive().optional());

const healthEnvSchema = z.object({
  SERVICE_NAME: optionalString,
  SERVICE_VERSION: optionalString,
  HEALTH_GLOBAL_TIMEOUT_MS: optionalPositiveInt,
  HEALTH_CHECK_TIMEOUT_MS: optionalPositiveInt,
  HEALTH_MERGE_POLICY: z.preprocess(unsetWhenEmpty, mergePolicySchema.optional()),
  HEALTH_RETRY_AFTER_SECONDS: optionalPositiveInt,
});

/**
 * Read checker settings from the environment. Explicit overrides win over
 * environment values, which win over defaults.
 */
export function loadHealthConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: HealthCheckerConfigInput = {}
): HealthCheckerConfig {
  const result = healthEnvSchema.safeParse(env);
  if (!result.success) {
    throw new HealthConfigError('Invalid health environment configuration', formatIssues(result.error.issues));
  }

  const vars = result.data;
  return parseHealthCheckerConfig({
    serviceName: overrides.serviceName ?? vars.SERVICE_NAME,
    version: overrides.version ?? vars.SERVICE_VERSION,
    globalTimeoutMs: overrides.globalTimeoutMs ?? vars.HEALTH_GLOBAL_TIMEOUT_MS,
    perCheckTimeoutMs: overrides.perCheckTimeoutMs ?? vars.HEALTH_CHECK_TIMEOUT_MS,
    mergePolicy: overrides.mergePolicy ?? vars.HEALTH_MERGE_POLICY,
    retryAfterSeconds: overrides.retryAfterSeconds ?? vars.HEALTH_RETRY_AFTER_SECONDS,
  });
}
