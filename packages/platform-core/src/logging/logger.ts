/**
 * Logger
 *
 * Winston loggers for the service shell and the platform-core modules
 */

import * as winston from 'winston';
import { hostname } from 'os';
import { consoleFormat, jsonFormat } from './formats.js';

export type { Logger } from 'winston';

export interface LoggerDefaults {
  service: string;
  module?: string;
  env: string;
  version?: string;
  instanceId: string;
}

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'production') return 'info';
  if (process.env.NODE_ENV === 'test') return 'warn';
  return 'debug';
}

export function createLogger(service: string, defaults: Partial<LoggerDefaults> = {}): winston.Logger {
  const env = process.env.NODE_ENV || 'development';
  const defaultMeta: LoggerDefaults = {
    service,
    env,
    version: process.env.SERVICE_VERSION,
    instanceId: process.env.HOSTNAME || hostname(),
    ...defaults,
  };

  return winston.createLogger({
    level: resolveLevel(),
    defaultMeta,
    format: env === 'development' ? consoleFormat() : jsonFormat(),
    transports: [new winston.transports.Console()],
  });
}

const moduleLoggers = new Map<string, winston.Logger>();

/**
 * Memoised logger for a platform-core module, tagged with SERVICE_NAME
 */
export function getLogger(module: string): winston.Logger {
  const cached = moduleLoggers.get(module);
  if (cached) return cached;

  const logger = createLogger(process.env.SERVICE_NAME || 'healthmesh', { module });
  moduleLoggers.set(module, logger);
  return logger;
}
