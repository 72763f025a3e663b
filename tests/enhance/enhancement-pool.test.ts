import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@prepscout/core';
import type { CandidateItem } from '@prepscout/schemas';
import {
  buildEnhancementPrompt,
  enhanceCandidates,
  findRelevantContent,
  type CandidateEnhancer,
  type EnhancementRequest,
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

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const decorators = candidate('What are Python decorators?', { skills: ['Python'] });

describe('findRelevantContent', () => {
  const strong = { title: 'Python guide', body: 'Python interview questions: decorators and generators' };
  const weak = { body: 'an interview' };

  it('picks the best-scoring piece', () => {
    expect(findRelevantContent(decorators, [weak, strong])).toBe(strong.body);
  });

  it('returns null when nothing scores at least 2', () => {
    expect(findRelevantContent(decorators, [weak])).toBeNull();
    expect(findRelevantContent(decorators, [])).toBeNull();
  });

  it('counts a skill found only in the title', () => {
    const titled = { title: 'Python', body: 'nothing relevant here' };
    expect(findRelevantContent(decorators, [titled])).toBe('nothing relevant here');
  });

  it('caps the returned context at 1000 characters', () => {
    const long = { body: `python ${'z'.repeat(2000)}` };
    expect(findRelevantContent(decorators, [long])).toHaveLength(1000);
  });
});

describe('buildEnhancementPrompt', () => {
  it('includes the question, answer and context', () => {
    const lines = buildEnhancementPrompt({ text: 'Q?', answer: 'A.' }, 'CTX').split('\n');
    expect(lines[2]).toBe('Original Question: Q?');
    expect(lines[3]).toBe('Original Answer: A.');
    expect(lines[6]).toBe('CTX');
  });
});

describe('enhanceCandidates', () => {
  const content = [{ body: 'Python decorators wrap functions' }];
  const holiday = candidate('Describe your favourite holiday');

  it('enhances matched candidates and returns the rest unchanged, in order', async () => {
    const enhance = vi.fn(async (req: EnhancementRequest) => `Enhanced: ${req.candidate.text}`);

    const results = await enhanceCandidates([decorators, holiday], content, { enhance }, { logger: silentLogger() });

    expect(results[0]).toEqual({
      ...decorators,
      answer: 'Enhanced: What are Python decorators?',
      enhanced: true,
    });
    expect(results[1]).toBe(holiday);
    expect(enhance).toHaveBeenCalledTimes(1);
    expect(enhance.mock.calls[0]?.[0].context).toBe('Python decorators wrap functions');
    expect(decorators.enhanced).toBeUndefined();
  });

  it('keeps the original when the enhancer fails or returns nothing', async () => {
    const logger = silentLogger();
    const failing: CandidateEnhancer = {
      enhance: async () => {
        throw new Error('model unavailable');
      },
    };
    const empty: CandidateEnhancer = { enhance: async () => '   ' };

    expect((await enhanceCandidates([decorators], content, failing, { logger }))[0]).toBe(decorators);
    expect((await enhanceCandidates([decorators], content, empty, { logger }))[0]).toBe(decorators);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('runs at most `concurrency` enhancements at once', async () => {
    let active = 0;
    let peak = 0;
    const enhancer: CandidateEnhancer = {
      enhance: async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return 'better';
      },
    };
    const items = Array.from({ length: 6 }, (_, i) =>
      candidate(`What are Python decorators ${i}?`, { skills: ['Python'] }),
    );

    const results = await enhanceCandidates(items, content, enhancer, { concurrency: 2, logger: silentLogger() });

    expect(peak).toBe(2);
    expect(results.every((c) => c.enhanced === true)).toBe(true);
  });
});
