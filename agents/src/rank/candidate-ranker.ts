/**
 * Candidate Ranker - orders generated interview questions for a profile
 *
 * Two strategies:
 * - fuzzy (default): the page relevance scorer applied to question + answer
 * - heuristic: skill-tag overlap, role/company words in the question, difficulty fit
 */

import type { CandidateItem, JobProfile, ScoringStrategy } from '@prepscout/schemas';
import { clampScore, scoreRelevance } from './relevance-scorer.js';
import type { RankOptions } from './types.js';

export const GENERATED_SOURCE = 'Generated';

const HEURISTIC_WEIGHTS = {
  skill: 0.4,
  role: 0.3,
  company: 0.2,
  difficulty: 0.1,
} as const;

type Scorable = Pick<CandidateItem, 'text' | 'answer' | 'source'>;

/** Fuzzy score: the candidate viewed as a page titled by its question. */
export function scoreCandidate(candidate: Scorable, profile: JobProfile): number {
  return scoreRelevance(
    {
      title: candidate.text,
      body: `${candidate.text} ${candidate.answer}`,
      source: candidate.source ?? GENERATED_SOURCE,
    },
    profile,
  );
}

function wordShare(words: string[], haystack: string): number {
  if (words.length === 0) return 0;
  return words.filter((w) => haystack.includes(w)).length / words.length;
}

/** Difficulty that matches the profile's seniority. */
export function expectedDifficulty(experienceYears: number): CandidateItem['difficulty'] {
  if (experienceYears <= 2) return 'easy';
  if (experienceYears <= 5) return 'medium';
  return 'hard';
}

export function heuristicCandidateScore(
  candidate: Pick<CandidateItem, 'text' | 'skills' | 'difficulty'>,
  profile: JobProfile,
): number {
  const w = HEURISTIC_WEIGHTS;
  const question = candidate.text.toLowerCase();
  let score = 0;

  const profileSkills = profile.skills.map((s) => s.toLowerCase());
  if (profileSkills.length > 0) {
    const matches = candidate.skills.filter((s) => profileSkills.includes(s.toLowerCase())).length;
    score += (matches / profileSkills.length) * w.skill;
  }

  score += wordShare(profile.role.toLowerCase().split(/\s+/).filter(Boolean), question) * w.role;
  score += wordShare(profile.company.toLowerCase().split(/\s+/).filter(Boolean), question) * w.company;

  if (candidate.difficulty === expectedDifficulty(profile.experienceYears)) score += w.difficulty;

  return clampScore(score);
}

export function scoreCandidateWith(
  strategy: ScoringStrategy,
  candidate: CandidateItem,
  profile: JobProfile,
): number {
  return strategy === 'heuristic'
    ? heuristicCandidateScore(candidate, profile)
    : scoreCandidate(candidate, profile);
}

/**
 * Score every candidate and sort best first. Inputs are not mutated; ties keep input order.
 */
export function rankCandidates(
  candidates: readonly CandidateItem[],
  profile: JobProfile,
  options: RankOptions = {},
): CandidateItem[] {
  const strategy = options.strategy ?? 'fuzzy';
  return candidates
    .map((c) => ({ ...c, relevanceScore: scoreCandidateWith(strategy, c, profile) }))
    .sort((a, b) => b.relevanceScore - a.relevanceScore);
}
