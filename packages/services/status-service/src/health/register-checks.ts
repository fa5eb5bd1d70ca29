import {
  createCacheProbe,
  createDatabaseProbe,
  createHealthCheckRegistry,
  createHttpProbe,
  createProcessProbe,
  parseHealthCheckerConfig,
  type HealthChecker,
  type HealthCheckerConfigInput,
  type PingableCache,
  type QueryableDatabase,
} from '@healthmesh/platform-core';
import { BUILT_IN_CHECKS, type DependencyTarget } from '../config/environment.js';

/**
 * Live handles owned by main.ts; the checker only borrows them
 */
export interface CheckedResources {
  database?: QueryableDatabase;
  cache?: PingableCache;
  dependencies?: DependencyTarget[];
  maxHeapUsedBytes?: number;
}

export function buildHealthChecker(resources: CheckedResources, config: HealthCheckerConfigInput): HealthChecker {
  const parsedConfig = parseHealthCheckerConfig(config);
  // An HTTP request must not outlive the run that started it
  const requestTimeoutMs = Math.min(parsedConfig.perCheckTimeoutMs, parsedConfig.globalTimeoutMs);
  const registry = createHealthCheckRegistry();

  registry.add(
    BUILT_IN_CHECKS.process,
    'liveness',
    createProcessProbe({ maxHeapUsedBytes: resources.maxHeapUsedBytes })
  );

  if (resources.database) {
    registry.add(BUILT_IN_CHECKS.database, 'readiness', createDatabaseProbe(resources.database));
  }
  if (resources.cache) {
    registry.add(BUILT_IN_CHECKS.cache, 'readiness', createCacheProbe(resources.cache));
  }
  for (const dependency of resources.dependencies ?? []) {
    registry.add(dependency.name, 'readiness', createHttpProbe(dependency.url, { requestTimeoutMs }));
  }

  return registry.build(parsedConfig);
}
