/**
 * UI module - console output helpers
 */

export * from './interactions.js';
