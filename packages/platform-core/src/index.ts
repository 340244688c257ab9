/**
 * Platform Core - Shared Utilities for clusterwatch services
 *
 * - Structured logging with correlation tracking
 * - HTTP client with timeouts/retries and response contract validation
 * - Error handling patterns
 * - Configuration loading
 * - Scheduling, Prometheus metrics and graceful shutdown
 */

export * from './config/index.js';
export * from './error-handling/index.js';
export * from './errors/service-error.js';
export * from './http/index.js';
export * from './lifecycle/index.js';
export * from './logging/index.js';
export * from './metrics/index.js';
export * from './scheduling/index.js';
