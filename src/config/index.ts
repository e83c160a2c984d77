/**
 * Configuration module.
 * Loads and validates engine config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { LIMITS, PLAN_DEFAULTS, SESSION_DEFAULTS } from './defaults.js';
export { loadConfigFile, resolveLibraryPath, ConfigError } from './loader.js';
