/**
 * Context - prompt context assembly
 */

export * from './context-compressor.js';
export * from './types.js';
