/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './testCase.js';
export * from './conditions.js';
export * from './results.js';
export * from './config.js';
