/**
 * Enhance - bounded concurrent answer enrichment
 */

export * from './enhancement-pool.js';
export * from './types.js';
