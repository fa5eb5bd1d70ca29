/**
 * Environment Configuration
 * Status-service settings: listen port, backing store URLs and the checked
 * downstream services. Checker timeouts and policy come from platform-core.
 */

import { z } from 'zod';
import {
  HealthConfigError,
  formatIssues,
  loadHealthConfigFromEnv,
  type HealthCheckerConfig,
} from '@healthmesh/platform-core';

export const SERVICE_NAME = 'status-service';

export interface DependencyTarget {
  name: string;
  url: string;
}

export interface ServiceEnvironment {
  port: number;
  databaseUrl?: string;
  redisUrl?: string;
  dependencies: DependencyTarget[];
  maxHeapUsedBytes?: number;
  health: HealthCheckerConfig;
}

const unsetWhenEmpty = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const serviceEnvSchema = z.object({
  PORT: z.preprocess(unsetWhenEmpty, z.coerce.number().int().min(1).max(65535).default(3000)),
  DATABASE_URL: z.preprocess(unsetWhenEmpty, z.string().optional()),
  REDIS_URL: z.preprocess(unsetWhenEmpty, z.string().optional()),
  HEALTH_DEPENDENCY_URLS: z.preprocess(unsetWhenEmpty, z.string().optional()),
  HEALTH_MAX_HEAP_USED_BYTES: z.preprocess(unsetWhenEmpty, z.coerce.number().int().positive().optional()),
});

/** Names the service registers for its own probes */
export const BUILT_IN_CHECKS = { process: 'process', database: 'database', cache: 'cache' } as const;

function invalidDependencies(issue: string): HealthConfigError {
  return new HealthConfigError('Invalid HEALTH_DEPENDENCY_URLS entry', [issue]);
}

/**
 * Parse `name=url` pairs separated by commas. Names must be unique and must
 * not collide with a built-in check.
 */
export function parseDependencyUrls(value: string | undefined): DependencyTarget[] {
  if (!value) return [];

  const reserved = new Set<string>(Object.values(BUILT_IN_CHECKS));
  const seen = new Set<string>();

  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean)
    .map(item => {
      const separator = item.indexOf('=');
      const name = separator > 0 ? item.slice(0, separator).trim() : '';
      const url = separator > 0 ? item.slice(separator + 1).trim() : '';
      if (!name || !z.string().url().safeParse(url).success) {
        throw invalidDependencies(`expected name=url, got "${item}"`);
      }
      if (reserved.has(name)) {
        throw invalidDependencies(`"${name}" is reserved for a built-in check`);
      }
      if (seen.has(name)) {
        throw invalidDependencies(`duplicate dependency name "${name}"`);
      }
      seen.add(name);
      return { name, url };
    });
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): ServiceEnvironment {
  const result = serviceEnvSchema.safeParse(env);
  if (!result.success) {
    throw new HealthConfigError('Invalid status-service environment', formatIssues(result.error.issues));
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    redisUrl: vars.REDIS_URL,
    dependencies: parseDependencyUrls(vars.HEALTH_DEPENDENCY_URLS),
    maxHeapUsedBytes: vars.HEALTH_MAX_HEAP_USED_BYTES,
    health: loadHealthConfigFromEnv(env, { serviceName: env.SERVICE_NAME || SERVICE_NAME }),
  };
}
