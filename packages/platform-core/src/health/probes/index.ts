export * from './base-probe.js';
export * from './database-checks.js';
export * from './cache-checks.js';
export * from './dependency-checks.js';
export * from './process-checks.js';
