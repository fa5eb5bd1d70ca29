import type { Request, Response, NextFunction } from 'express';
import { getLogger } from '../logging/logger.js';
import { getRequestContext } from '../logging/context.js';

const logger = getLogger('error-handling');

export interface DomainErrorOptions {
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Error carrying the HTTP status and stable code it maps to
 */
export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, statusCode = 500, options: DomainErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.code = options.code;
    this.details = options.details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code ? { code: this.code } : {}),
      ...(this.details ? { details: this.details } : {}),
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Human-readable message for any thrown value; never empty
 */
export function errorMessage(error: unknown): string {
  let message: string;
  try {
    const raw: unknown = error instanceof Error ? Reflect.get(error, 'message') : error;
    message = typeof raw === 'string' ? raw : String(raw);
  } catch {
    // String() throws on objects without a prototype
    message = '';
  }
  return message.trim() || 'unknown error';
}

export function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof DomainError && error.code === code;
}

/**
 * Terminal Express middleware. DomainErrors answer with their own status and
 * code; anything else is a 500 whose message is hidden in production.
 */
export function errorHandler() {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) return next(error);

    const correlationId = getRequestContext()?.correlationId;
    const isDomainError = error instanceof DomainError;
    const statusCode = isDomainError ? error.statusCode : 500;

    logger.error(isDomainError ? 'Request failed' : 'Unhandled error', {
      method: req.method,
      path: req.originalUrl,
      statusCode,
      error: errorMessage(error),
      ...(isDomainError ? { code: error.code } : { stack: error instanceof Error ? error.stack : undefined }),
    });

    const exposeMessage = isDomainError || process.env.NODE_ENV !== 'production';
    res.status(statusCode).json({
      error: {
        code: (isDomainError ? error.code : undefined) ?? 'INTERNAL_ERROR',
        message: exposeMessage ? errorMessage(error) : 'Internal Server Error',
        ...(isDomainError && error.details ? { details: error.details } : {}),
        ...(correlationId ? { correlationId } : {}),
      },
    });
  };
}
