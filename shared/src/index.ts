/**
 * media-relay Plugin Utilities
 * Shared utilities for building media-relay plugins
 */

export * from './types.js';
export * from './logger.js';
export * from './database.js';
export * from './redis.js';
export * from './validation.js';
export * from './rate-limiter.js';
export * from './security.js';
