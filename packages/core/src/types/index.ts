/**
 * Public type exports for `@netdiag/core`.
 *
 * Keep this file as the single place to export types so consumers can import
 * from `@netdiag/core` without reaching into internal paths.
 */
export * from './cache.js';
export * from './certificate.js';
export * from './latency.js';
export * from './logger.js';
export * from './metrics.js';
export * from './network.js';
export * from './outcome.js';
