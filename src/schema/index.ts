/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './model.js';
export * from './workflow.js';
export * from './results.js';
export * from './jsonOutput.js';
