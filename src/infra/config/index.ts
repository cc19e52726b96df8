/**
 * Config module - exports all configuration utilities
 */

export * from './paths.js';
export * from './global/index.js';
export * from './resolveConfig.js';
export { applyGlobalConfigEnvOverrides, envVarNameFromPath } from './env/config-env-overrides.js';
