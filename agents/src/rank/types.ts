/**
 * Rank module types
 */

import type { ScoringStrategy } from '@prepscout/schemas';

/** What the relevance scorer reads from a page or candidate. */
export interface RelevanceInput {
  title?: string;
  body?: string;
  source?: string;
}

export interface RelevanceBreakdown {
  role: number;
  skills: number;
  keywords: number;
  credibility: number;
  /** Amount subtracted by the long-page penalty (0 or 0.2). */
  penalty: number;
  matchedKeywords: string[];
  wordCount: number;
  total: number;
}

export interface RankOptions {
  strategy?: ScoringStrategy;
}
