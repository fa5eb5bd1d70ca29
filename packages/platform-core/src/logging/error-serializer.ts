import { stringifyMeta } from './redaction.js';

export interface SerializedError {
  name?: string;
  message: string;
  code?: string;
  stack?: string;
  details?: Record<string, unknown>;
  cause?: SerializedError;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Plain-object view of a thrown value for log meta; follows `cause` up to
 * `depth` levels
 */
export function serializeError(error: unknown, depth = 3): SerializedError {
  if (error instanceof Error) {
    const code = stringField(error, 'code');
    const details: unknown = Reflect.get(error, 'details');
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack,
      ...(isRecord(details) ? { details: { ...details } } : {}),
      ...(error.cause !== undefined && depth > 1 ? { cause: serializeError(error.cause, depth - 1) } : {}),
    };
  }

  if (isRecord(error)) {
    const name = stringField(error, 'name');
    const code = stringField(error, 'code');
    return {
      message: stringField(error, 'message') ?? stringField(error, 'error') ?? stringifyMeta(error, 500),
      ...(name ? { name } : {}),
      ...(code ? { code } : {}),
    };
  }

  return { message: String(error) };
}
