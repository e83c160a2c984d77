/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './plan.js';
export * from './state.js';
export * from './turn.js';
export * from './config.js';
export * from './results.js';
export * from './jsonOutput.js';
