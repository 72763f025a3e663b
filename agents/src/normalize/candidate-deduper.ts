/**
 * Candidate Deduper - removes repeated interview questions
 *
 * Candidates are only compared within their (difficulty, category) group.
 * Stage 1 drops exact repeats after text normalization; stage 2 drops
 * near-repeats whose token-set similarity to an accepted question reaches
 * the threshold. Output keeps input order.
 */

import { createLogger, tokenSetRatio } from '@prepscout/core';
import type { CandidateItem, Difficulty } from '@prepscout/schemas';
import type { CandidateSummary, DedupeOptions } from './types.js';

export const DEFAULT_DEDUPE_THRESHOLD = 85;

const logger = createLogger('candidate-deduper');

type Dedupable = Pick<CandidateItem, 'text' | 'difficulty' | 'category'>;

/** Lowercase, punctuation stripped, whitespace collapsed. */
export function normalizeQuestionText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function groupKey(item: Dedupable): string {
  return `${item.difficulty}\u0000${item.category}`;
}

export function deduplicateCandidates<T extends Dedupable>(
  items: readonly T[],
  options: DedupeOptions = {},
): T[] {
  const threshold = options.threshold ?? DEFAULT_DEDUPE_THRESHOLD;
  const groups = new Map<string, { seen: Set<string>; accepted: string[] }>();
  const kept: T[] = [];
  let exact = 0;
  let fuzzy = 0;

  for (const item of items) {
    const key = groupKey(item);
    let group = groups.get(key);
    if (!group) {
      group = { seen: new Set(), accepted: [] };
      groups.set(key, group);
    }

    const normalized = normalizeQuestionText(item.text);
    if (group.seen.has(normalized)) {
      exact++;
      continue;
    }
    group.seen.add(normalized);

    if (group.accepted.some((prior) => tokenSetRatio(normalized, prior) >= threshold)) {
      fuzzy++;
      continue;
    }
    group.accepted.push(normalized);
    kept.push(item);
  }

  if (exact || fuzzy) {
    logger.debug(`Removed ${exact} exact and ${fuzzy} near duplicates (${items.length} -> ${kept.length})`);
  }
  return kept;
}

/** Counts by difficulty, category and source, plus the mean score of scored items. */
export function summarizeCandidates(items: readonly CandidateItem[]): CandidateSummary {
  const byDifficulty: Record<Difficulty, number> = { easy: 0, medium: 0, hard: 0 };
  const byCategory: Record<string, number> = {};
  const bySource: Record<string, number> = {};
  let enhanced = 0;
  let scoredTotal = 0;
  let scoredCount = 0;

  for (const item of items) {
    byDifficulty[item.difficulty]++;
    byCategory[item.category] = (byCategory[item.category] ?? 0) + 1;
    const source = item.source ?? 'Generated';
    bySource[source] = (bySource[source] ?? 0) + 1;
    if (item.enhanced) enhanced++;
    if (item.relevanceScore > 0) {
      scoredTotal += item.relevanceScore;
      scoredCount++;
    }
  }

  return {
    total: items.length,
    byDifficulty,
    byCategory,
    bySource,
    enhanced,
    averageRelevance: scoredCount ? scoredTotal / scoredCount : 0,
  };
}
