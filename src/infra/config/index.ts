/**
 * Config module - exports configuration utilities
 */

export * from './paths.js';
export * from './loadConfig.js';
export * from './runtimeConfig.js';
export { applyConfigEnvOverrides, envVarNameFromPath } from './env/config-env-overrides.js';
