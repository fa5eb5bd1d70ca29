/**
 * Log Formats
 *
 * Console lines for local development, one JSON document per record elsewhere
 */

import * as winston from 'winston';
import { getRequestContext } from './context.js';
import { stringifyMeta } from './redaction.js';

const { combine, timestamp, colorize, errors, printf } = winston.format;

const withCorrelationId = winston.format(info => {
  const context = getRequestContext();
  if (context && info.correlationId === undefined) {
    info.correlationId = context.correlationId;
  }
  return info;
});

export function consoleFormat(): winston.Logform.Format {
  return combine(
    withCorrelationId(),
    timestamp({ format: 'HH:mm:ss.SSS' }),
    colorize(),
    printf(({ timestamp: time, level, message, service, module, correlationId, env, instanceId, version, ...meta }) => {
      const scope = module ? `${String(service)}/${String(module)}` : String(service);
      const correlation = typeof correlationId === 'string' ? ` [${correlationId.slice(0, 8)}]` : '';
      const extra = Object.keys(meta).length > 0 ? ` ${stringifyMeta(meta, 1000)}` : '';
      return `${String(time)} ${level} ${scope}${correlation}: ${String(message)}${extra}`;
    })
  );
}

export function jsonFormat(): winston.Logform.Format {
  return combine(
    withCorrelationId(),
    timestamp(),
    errors({ stack: true }),
    printf(info => stringifyMeta(info, 50000))
  );
}
