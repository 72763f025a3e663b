/**
 * Rank - relevance scoring
 *
 * - scoreRelevance / explainRelevance: page relevance for a job profile
 * - scoreCandidate / rankCandidates: the same scoring applied to interview questions
 */

export * from './relevance-scorer.js';
export * from './candidate-ranker.js';
export * from './types.js';
