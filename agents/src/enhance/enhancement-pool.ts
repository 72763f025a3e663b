/**
 * Enhancement Pool - enrich candidate answers with fetched content
 *
 * For each candidate, the best-matching content piece is handed to the
 * injected enhancer (the text-generation step). At most `concurrency`
 * enhancer calls run at once. A candidate with no matching content, or whose
 * enhancement fails, comes back unchanged. Output keeps input order.
 */

import { createLogger, describeError, runPool, type Logger } from '@prepscout/core';
import type { CandidateItem } from '@prepscout/schemas';
import type { CandidateEnhancer, EnhanceOptions, EnhancementSource } from './types.js';

export const DEFAULT_ENHANCE_CONCURRENCY = 5;
export const MIN_CONTENT_MATCH = 2;
export const MAX_CONTEXT_CHARS = 1000;

const CONTENT_KEYWORDS = ['interview', 'question', 'technical', 'coding', 'programming'];
const LEADING_WORDS = 5;

/**
 * Pick the content piece most related to a candidate, or null when nothing scores at least 2.
 * Skill in body or title: +2 each. Content keyword in body: +1 each.
 * Any of the question's first five words in body: +1.
 */
export function findRelevantContent(
  candidate: Pick<CandidateItem, 'text' | 'skills'>,
  content: readonly EnhancementSource[],
): string | null {
  const skills = candidate.skills.map((s) => s.toLowerCase());
  const leading = candidate.text.toLowerCase().split(/\s+/).filter(Boolean).slice(0, LEADING_WORDS);

  let best: string | null = null;
  let bestScore = 0;

  for (const piece of content) {
    const body = piece.body.toLowerCase();
    const title = (piece.title ?? '').toLowerCase();
    let score = 0;

    for (const skill of skills) {
      if (body.includes(skill) || title.includes(skill)) score += 2;
    }
    for (const keyword of CONTENT_KEYWORDS) {
      if (body.includes(keyword)) score += 1;
    }
    if (leading.some((word) => body.includes(word))) score += 1;

    if (score > bestScore) {
      bestScore = score;
      best = piece.body.slice(0, MAX_CONTEXT_CHARS);
    }
  }

  return bestScore >= MIN_CONTENT_MATCH ? best : null;
}

export function buildEnhancementPrompt(candidate: Pick<CandidateItem, 'text' | 'answer'>, context: string): string {
  return [
    'Enhance this interview question with additional context and examples from the provided content.',
    '',
    `Original Question: ${candidate.text}`,
    `Original Answer: ${candidate.answer}`,
    '',
    'Relevant Context:',
    context,
    '',
    'Please enhance the answer to be more comprehensive and include:',
    '1. Real-world examples',
    '2. Additional context from the provided content',
    '3. More detailed explanations',
    '4. Practical tips or best practices',
    '',
    'Return only the enhanced answer text, not the question.',
  ].join('\n');
}

async function enhanceOne(
  candidate: CandidateItem,
  content: readonly EnhancementSource[],
  enhancer: CandidateEnhancer,
  logger: Logger,
): Promise<CandidateItem> {
  const context = findRelevantContent(candidate, content);
  if (!context) return candidate;

  try {
    const answer = (
      await enhancer.enhance({ candidate, context, prompt: buildEnhancementPrompt(candidate, context) })
    ).trim();
    if (!answer) {
      logger.warn(`Enhancer returned an empty answer: ${candidate.text.slice(0, 80)}`);
      return candidate;
    }
    return { ...candidate, answer, enhanced: true };
  } catch (err) {
    logger.warn(`Enhancement failed: ${candidate.text.slice(0, 80)}`, describeError(err));
    return candidate;
  }
}

export async function enhanceCandidates(
  candidates: readonly CandidateItem[],
  content: readonly EnhancementSource[],
  enhancer: CandidateEnhancer,
  options: EnhanceOptions = {},
): Promise<CandidateItem[]> {
  const logger = options.logger ?? createLogger('enhancement-pool');
  const results = await runPool(candidates, (c) => enhanceOne(c, content, enhancer, logger), {
    concurrency: options.concurrency ?? DEFAULT_ENHANCE_CONCURRENCY,
  });
  logger.info(`Enhanced ${results.filter((c) => c.enhanced).length}/${candidates.length} candidates`);
  return results;
}
