/**
 * testbatch public API.
 */

export * from './core/index.js';
export * from './schema/index.js';
export * from './report/index.js';
export * from './config/index.js';
