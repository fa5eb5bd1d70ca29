/**
 * Logging Module - Index
 */

export * from './logger.js';
export * from './formats.js';
export * from './redaction.js';
export * from './context.js';
export * from './middleware.js';
export * from './error-serializer.js';
