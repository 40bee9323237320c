/**
 * Shared utilities
 * @module utils
 */

export * from './logging/index.js';
export * from './concurrency/index.js';
export * from './errorTypes.js';
