/**
 * Platform Core - Composable health checks for Express services
 *
 * - Check registry and concurrent check aggregator
 * - Relational, cache, HTTP, process and closure probes
 * - Report rendering and liveness/readiness routes
 * - Structured logging with correlation tracking
 * - Error handling patterns
 */

export * from './config/index.js';
export * from './error-handling/index.js';
export * from './health/index.js';
export * from './logging/index.js';
export * from './lifecycle/index.js';
