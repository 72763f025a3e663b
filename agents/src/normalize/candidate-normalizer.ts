/**
 * Candidate Normalizer - raw generator output → CandidateItem
 *
 * Missing or malformed optional fields take their defaults; only a value
 * without usable question text is rejected (null).
 */

import { z } from 'zod';
import {
  candidateItemSchema,
  difficultyEnum,
  type CandidateItem,
  type CandidateItemInput,
} from '@prepscout/schemas';
import { clampScore } from '../rank/relevance-scorer.js';

const recordSchema = z.record(z.unknown());

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value.trim() : undefined;
}

export function normalizeCandidate(raw: unknown): CandidateItem | null {
  const parsed = recordSchema.safeParse(raw);
  if (!parsed.success || Array.isArray(raw)) return null;
  const r = parsed.data;

  const text = str(r.text) || str(r.question);
  if (!text) return null;

  // Unset fields take the schema defaults.
  const input: CandidateItemInput = { text };
  const answer = str(r.answer);
  if (answer !== undefined) input.answer = answer;
  const category = str(r.category);
  if (category) input.category = category;
  const difficulty = difficultyEnum.safeParse(str(r.difficulty)?.toLowerCase());
  if (difficulty.success) input.difficulty = difficulty.data;
  if (Array.isArray(r.skills)) {
    input.skills = r.skills.filter((s): s is string => typeof s === 'string' && s.trim() !== '');
  }
  if (typeof r.relevanceScore === 'number') input.relevanceScore = clampScore(r.relevanceScore);
  const source = str(r.source);
  if (source) input.source = source;
  if (typeof r.enhanced === 'boolean') input.enhanced = r.enhanced;

  const item = candidateItemSchema.safeParse(input);
  return item.success ? item.data : null;
}

/** Normalize a batch, dropping entries without text. */
export function normalizeCandidates(raw: readonly unknown[]): CandidateItem[] {
  const out: CandidateItem[] = [];
  for (const value of raw) {
    const item = normalizeCandidate(value);
    if (item) out.push(item);
  }
  return out;
}
