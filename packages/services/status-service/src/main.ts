// Must stay the first import: .env has to be loaded before module loggers read LOG_LEVEL
import 'dotenv/config';

/**
 * Status Service
 * Opens the backing store connections, registers their probes and serves
 * the health routes until SIGTERM/SIGINT.
 */

import { Pool } from 'pg';
import { Redis } from 'ioredis';
import { createLogger, GracefulShutdown, serializeError } from '@healthmesh/platform-core';
import { loadEnvironment, SERVICE_NAME } from './config/environment.js';
import { buildHealthChecker } from './health/register-checks.js';
import { createApp } from './app.js';

const logger = createLogger(SERVICE_NAME);

async function main(): Promise<void> {
  const env = loadEnvironment();
  const shutdown = new GracefulShutdown();

  const pool = env.databaseUrl
    ? new Pool({ connectionString: env.databaseUrl, max: 2, idleTimeoutMillis: 10000, connectionTimeoutMillis: 5000 })
    : undefined;
  if (pool) {
    pool.on('error', error => logger.warn('Idle database client error', { error: serializeError(error) }));
    shutdown.register('connections', 'postgres', () => pool.end());
  }

  const redis = env.redisUrl ? new Redis(env.redisUrl, { maxRetriesPerRequest: 1, enableOfflineQueue: false }) : undefined;
  if (redis) {
    redis.on('error', error => logger.warn('Redis connection error', { error: serializeError(error) }));
    shutdown.register('connections', 'redis', async () => {
      await redis.quit();
    });
  }

  const checker = buildHealthChecker(
    { database: pool, cache: redis, dependencies: env.dependencies, maxHeapUsedBytes: env.maxHeapUsedBytes },
    env.health
  );
  const serviceName = env.health.serviceName ?? SERVICE_NAME;
  const app = createApp(checker, serviceName);

  const server = app.listen(env.port, () => {
    logger.info('Status service listening', {
      port: env.port,
      checks: checker.checkNames,
      mergePolicy: env.health.mergePolicy,
    });
  });

  shutdown.register(
    'drain',
    'http-server',
    () => new Promise<void>((resolveClose, rejectClose) => server.close(error => (error ? rejectClose(error) : resolveClose())))
  );
  shutdown.install();
}

main().catch((error: unknown) => {
  logger.error('Status service failed to start', { error: serializeError(error) });
  process.exit(1);
});
