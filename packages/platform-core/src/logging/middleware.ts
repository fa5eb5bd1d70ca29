import type { Request, Response, NextFunction } from 'express';
import { getLogger } from './logger.js';
import { newCorrelationId, withRequestContext, type RequestContext } from './context.js';

const logger = getLogger('http');

/**
 * Opens a request context keyed by the inbound x-correlation-id (or a fresh
 * one), echoes it on the response and logs completion at debug
 */
export function requestLogger(serviceName: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const context: RequestContext = {
      correlationId: req.get('x-correlation-id') || newCorrelationId(),
      service: serviceName,
      method: req.method,
      path: req.originalUrl,
    };
    const startedAt = Date.now();

    res.setHeader('x-correlation-id', context.correlationId);
    res.on('finish', () => {
      logger.debug('Request completed', {
        method: context.method,
        path: context.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
        correlationId: context.correlationId,
      });
    });

    withRequestContext(context, () => next());
  };
}
