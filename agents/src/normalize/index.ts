/**
 * Normalize - candidate cleanup
 *
 * - normalizeCandidate: raw generator output → CandidateItem with defaults
 * - deduplicateCandidates: exact + fuzzy dedupe within (difficulty, category)
 * - summarizeCandidates: counts for reporting
 */

export * from './candidate-normalizer.js';
export * from './candidate-deduper.js';
export * from './types.js';
