/**
 * plangraph — graph workflow engine for conversational agents.
 *
 * Host loops call `runTurn` once per turn with the session value they
 * own, and inject the returned status block into the next prompt.
 */

export * from './schema/index.js';
export * from './core/index.js';
export { loadPlanLibrary, parseLibraryDocument, clearLibraryCache, LibraryError } from './library/index.js';
export { loadConfigFile, resolveLibraryPath, ConfigError, LIMITS, PLAN_DEFAULTS } from './config/index.js';
