/**
 * Clean up a batch of generated interview questions: normalize, dedupe, rank.
 *
 * Run: npx tsx scripts/prepare-candidates.ts
 * Env: CANDIDATES_FILE (JSON array, required), MINE_ROLE (required), MINE_COMPANY,
 *      MINE_SKILLS (comma-separated), MINE_EXPERIENCE_YEARS, RANK_STRATEGY (fuzzy|heuristic),
 *      OUT_FILE to write the ranked list instead of printing it.
 */
import { runtimeConfig } from './load-env';

import * as fs from 'fs';
import * as path from 'path';
import { createLogger, describeError } from '@prepscout/core';
import { jobProfileSchema, scoringStrategyEnum } from '@prepscout/schemas';
import {
  deduplicateCandidates,
  normalizeCandidates,
  rankCandidates,
  summarizeCandidates,
} from '@prepscout/agents';

const logger = createLogger('prepare-candidates');

function list(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

async function main() {
  const file = process.env.CANDIDATES_FILE?.trim();
  if (!file) throw new Error('CANDIDATES_FILE is required');

  const profile = jobProfileSchema.parse({
    role: process.env.MINE_ROLE?.trim(),
    company: process.env.MINE_COMPANY ?? '',
    skills: list(process.env.MINE_SKILLS),
    experienceYears: Number(process.env.MINE_EXPERIENCE_YEARS ?? 0),
  });
  const strategy = scoringStrategyEnum.parse(process.env.RANK_STRATEGY ?? 'fuzzy');

  const raw: unknown = JSON.parse(await fs.promises.readFile(path.resolve(process.cwd(), file), 'utf8'));
  if (!Array.isArray(raw)) throw new Error(`${file} must contain a JSON array`);

  const candidates = normalizeCandidates(raw);
  const unique = deduplicateCandidates(candidates, { threshold: runtimeConfig.DEDUPE_THRESHOLD });
  const ranked = rankCandidates(unique, profile, { strategy });
  const summary = summarizeCandidates(ranked);

  logger.info(
    `${raw.length} raw -> ${candidates.length} valid -> ${unique.length} unique; avg relevance ${summary.averageRelevance.toFixed(2)}`,
  );
  logger.info('By difficulty', summary.byDifficulty);

  const out = process.env.OUT_FILE?.trim();
  if (out) {
    await fs.promises.writeFile(path.resolve(process.cwd(), out), `${JSON.stringify(ranked, null, 2)}\n`);
    logger.info(`Wrote ${ranked.length} candidates to ${out}`);
  } else {
    console.log(JSON.stringify(ranked, null, 2));
  }
}

main().catch((err) => {
  logger.error('Failed to prepare candidates', describeError(err));
  process.exitCode = 1;
});
