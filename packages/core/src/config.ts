/**
 * Runtime configuration read from the environment.
 * scripts/load-env.ts loads .env.local / .env into process.env beforehand.
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const unitScore = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

export const configSchema = z.object({
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  SERPAPI_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  GITHUB_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  FETCH_TIMEOUT_MS: positiveInt(10_000),
  RENDER_TIMEOUT_MS: positiveInt(30_000),
  RENDER_SETTLE_MS: z.coerce.number().int().min(0).default(2_000),
  RATE_LIMIT_PER_SECOND: z.coerce.number().positive().default(2),
  POOL_MAX_CONNECTIONS: positiveInt(10),
  POOL_MAX_PER_HOST: positiveInt(5),
  BODY_CHAR_LIMIT: positiveInt(5_000),
  DEDUPE_THRESHOLD: z.coerce.number().min(0).max(100).default(85),
  CONTEXT_MAX_TOKENS: positiveInt(3_000),
  CONTEXT_CHAR_LIMIT: positiveInt(350),
  MIN_RELEVANCE: unitScore(0.3),
  MAX_SEARCH_CALLS: z.coerce.number().int().min(0).default(5),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration. Throws with every offending key listed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}
