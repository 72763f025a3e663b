/**
 * Normalize module types
 */

import type { Difficulty } from '@prepscout/schemas';

export interface DedupeOptions {
  /** Token-set similarity (0-100) at or above which two questions count as the same. */
  threshold?: number;
}

export interface CandidateSummary {
  total: number;
  byDifficulty: Record<Difficulty, number>;
  byCategory: Record<string, number>;
  bySource: Record<string, number>;
  enhanced: number;
  averageRelevance: number;
}
