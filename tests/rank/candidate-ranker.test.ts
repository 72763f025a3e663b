import { describe, it, expect } from 'vitest';
import type { CandidateItem, JobProfile } from '@prepscout/schemas';
import {
  expectedDifficulty,
  heuristicCandidateScore,
  rankCandidates,
  scoreCandidate,
} from '@prepscout/agents';

function candidate(text: string, overrides: Partial<CandidateItem> = {}): CandidateItem {
  return {
    text,
    answer: '',
    category: 'Technical',
    difficulty: 'medium',
    skills: [],
    relevanceScore: 0,
    ...overrides,
  };
}

const dataScientist: JobProfile = { role: 'Data Scientist', company: '', skills: ['Python'], experienceYears: 0 };

describe('expectedDifficulty', () => {
  it('maps experience to difficulty', () => {
    expect(expectedDifficulty(0)).toBe('easy');
    expect(expectedDifficulty(2)).toBe('easy');
    expect(expectedDifficulty(3)).toBe('medium');
    expect(expectedDifficulty(5)).toBe('medium');
    expect(expectedDifficulty(6)).toBe('hard');
  });
});

describe('heuristicCandidateScore', () => {
  it('combines skill tags, role and company words and difficulty fit', () => {
    const profile: JobProfile = {
      role: 'Backend Engineer',
      company: 'Acme Corp',
      skills: ['Go', 'SQL'],
      experienceYears: 4,
    };
    const c = candidate('How would a backend engineer at Acme design a SQL schema?', {
      skills: ['sql', 'Kafka'],
      difficulty: 'medium',
    });
    // skills 0.5 * 0.4, role 1 * 0.3, company 0.5 * 0.2, difficulty 0.1
    expect(heuristicCandidateScore(c, profile)).toBeCloseTo(0.7);
  });
});

describe('scoreCandidate', () => {
  it('scores a question like a page titled by it', () => {
    expect(scoreCandidate(candidate('Data Scientist Python interview question'), dataScientist)).toBeCloseTo(0.8);
  });

  it('credits a trusted source', () => {
    const plain = scoreCandidate(candidate('Data Scientist Python'), dataScientist);
    const sourced = scoreCandidate(candidate('Data Scientist Python', { source: 'LeetCode' }), dataScientist);
    expect(sourced - plain).toBeCloseTo(0.1);
  });
});

describe('rankCandidates', () => {
  it('sorts best first without mutating the input', () => {
    const weak = candidate('What is a linked list?');
    const strong = candidate('Data Scientist Python interview question');

    const ranked = rankCandidates([weak, strong], dataScientist);

    expect(ranked.map((c) => c.text)).toEqual([strong.text, weak.text]);
    expect(ranked[0]?.relevanceScore).toBeCloseTo(0.8);
    expect(weak.relevanceScore).toBe(0);
    expect(strong.relevanceScore).toBe(0);
  });

  it('keeps input order for ties', () => {
    const profile: JobProfile = { role: 'Zed', company: '', skills: [], experienceYears: 0 };
    const items = ['first', 'second', 'third'].map((t) => candidate(t, { difficulty: 'hard' }));

    const ranked = rankCandidates(items, profile, { strategy: 'heuristic' });

    expect(ranked.map((c) => c.text)).toEqual(['first', 'second', 'third']);
    expect(ranked.every((c) => c.relevanceScore === 0)).toBe(true);
  });
});
