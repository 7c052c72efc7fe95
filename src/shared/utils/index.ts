/**
 * Shared utilities
 */

export * from './debug.js';
export * from './error.js';
export * from './format.js';
