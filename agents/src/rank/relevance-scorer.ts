/**
 * Relevance Scorer - how useful a page is for preparing a given role
 *
 * Additive, in order: role match, skill match, interview keywords, source
 * credibility, long-page penalty; clamped to [0, 1] at the end.
 * Deterministic, no I/O.
 */

import { CREDIBLE_SOURCES, INTERVIEW_KEYWORDS, similarity } from '@prepscout/core';
import type { JobProfile } from '@prepscout/schemas';
import type { RelevanceBreakdown, RelevanceInput } from './types.js';

export const RELEVANCE_WEIGHTS = {
  role: 0.4,
  roleTitleShare: 0.6,
  roleBodyShare: 0.4,
  skill: 0.2,
  keyword: 0.1,
  credibility: 0.1,
  longPagePenalty: 0.2,
} as const;

export const LONG_PAGE_WORDS = 3000;
export const LONG_PAGE_SCORE_CEILING = 0.5;

export function clampScore(n: number): number {
  if (Number.isNaN(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function explainRelevance(
  item: RelevanceInput,
  profile: Pick<JobProfile, 'role' | 'skills'>,
): RelevanceBreakdown {
  const w = RELEVANCE_WEIGHTS;
  const body = item.body ?? '';
  const title = item.title ?? '';

  const role =
    w.role *
    (w.roleTitleShare * similarity(profile.role, title) + w.roleBodyShare * similarity(profile.role, body));

  let skills = 0;
  for (const skill of profile.skills) skills += w.skill * similarity(skill, body);

  const lowerBody = body.toLowerCase();
  const matchedKeywords = INTERVIEW_KEYWORDS.filter((k) => lowerBody.includes(k));
  const keywords = w.keyword * matchedKeywords.length;

  const lowerSource = (item.source ?? '').toLowerCase();
  const credible = CREDIBLE_SOURCES.some((s) => lowerSource.includes(s));
  const credibility = credible ? w.credibility : 0;

  const running = role + skills + keywords + credibility;
  const wordCount = countWords(body);
  const penalty =
    wordCount > LONG_PAGE_WORDS && running < LONG_PAGE_SCORE_CEILING ? w.longPagePenalty : 0;

  return {
    role,
    skills,
    keywords,
    credibility,
    penalty,
    matchedKeywords: [...matchedKeywords],
    wordCount,
    total: clampScore(running - penalty),
  };
}

export function scoreRelevance(item: RelevanceInput, profile: Pick<JobProfile, 'role' | 'skills'>): number {
  return explainRelevance(item, profile).total;
}
