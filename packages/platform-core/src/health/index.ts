/**
 * Health Module - Index
 */

export * from './types.js';
export * from './errors.js';

// Engine
export * from './check-registry.js';
export * from './health-checker.js';
export * from './merge-policy.js';

// Rendering and Express mount
export * from './reporter.js';
export * from './health-routes.js';

// Probe variants
export * from './probes/index.js';
