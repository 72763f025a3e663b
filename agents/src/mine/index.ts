/**
 * Mine - end-to-end content mining for a job profile
 */

export * from './knowledge-miner-agent.js';
export * from './memory-sink.js';
export * from './types.js';
