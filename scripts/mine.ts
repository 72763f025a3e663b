/**
 * Mine interview-prep content for one role and print the compressed context.
 *
 * Run: npx tsx scripts/mine.ts
 * Env: MINE_ROLE (required), MINE_COMPANY, MINE_SKILLS (comma-separated),
 *      MINE_SEED_URLS (comma-separated; the built-in catalogue is used when empty),
 *      MINE_RENDER=1 to enable the browser fallback, MINE_FREE_SEARCH=0 to skip GitHub/Reddit.
 * Uses the Postgres cache and results table when DATABASE_URL is set, memory otherwise.
 */
import { runtimeConfig } from './load-env';

import { createLogger, describeError } from '@prepscout/core';
import {
  closeDb,
  DATABASE_ERROR_MESSAGE,
  DbContentCache,
  DbSearchResultSink,
  getDb,
  isDatabaseConnectionError,
} from '@prepscout/db';
import {
  ContentFetcher,
  KnowledgeMinerAgent,
  MemoryContentCache,
  MemorySearchResultSink,
  createGitHubSearchClient,
  createRedditSearchClient,
  createSerpApiClient,
  isSearchConfigured,
  openBrowserSession,
  type BrowserSession,
} from '@prepscout/agents';

const logger = createLogger('mine');

function list(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

async function main() {
  const role = process.env.MINE_ROLE?.trim();
  if (!role) throw new Error('MINE_ROLE is required');

  const useDb = Boolean(runtimeConfig.DATABASE_URL);
  const db = useDb ? getDb() : null;
  const session: BrowserSession | null =
    process.env.MINE_RENDER === '1' ? await openBrowserSession() : null;

  try {
    const fetcher = ContentFetcher.fromConfig(runtimeConfig, {
      cache: db ? new DbContentCache(db) : new MemoryContentCache(),
      renderContext: session?.context ?? null,
    });
    const miner = new KnowledgeMinerAgent({
      fetcher,
      search: isSearchConfigured(runtimeConfig.SERPAPI_KEY)
        ? createSerpApiClient({ apiKey: runtimeConfig.SERPAPI_KEY })
        : null,
      freeSearch:
        process.env.MINE_FREE_SEARCH === '0'
          ? []
          : [createGitHubSearchClient({ token: runtimeConfig.GITHUB_TOKEN }), createRedditSearchClient()],
      sink: db ? new DbSearchResultSink(db) : new MemorySearchResultSink(),
      maxSearchCalls: runtimeConfig.MAX_SEARCH_CALLS,
      fetchConcurrency: runtimeConfig.POOL_MAX_CONNECTIONS,
      compression: {
        maxTokens: runtimeConfig.CONTEXT_MAX_TOKENS,
        perItemCharLimit: runtimeConfig.CONTEXT_CHAR_LIMIT,
        minRelevance: runtimeConfig.MIN_RELEVANCE,
      },
    });

    const result = await miner.execute({
      profile: {
        role,
        company: process.env.MINE_COMPANY ?? '',
        skills: list(process.env.MINE_SKILLS),
      },
      seedUrls: list(process.env.MINE_SEED_URLS),
      includeCommonPatterns: true,
    });

    if (!result.success || !result.data) {
      logger.error(`Mining failed: ${result.error ?? 'unknown error'}`);
      process.exitCode = 1;
      return;
    }

    const { stats, context } = result.data;
    logger.info(
      `queries=${stats.queries} searchCalls=${stats.searchCalls} freeSearchCalls=${stats.freeSearchCalls} fetched=${stats.fetched} failed=${stats.failed} kept=${stats.kept}`,
    );
    console.log(context.text);
  } finally {
    await session?.close();
  }
}

main()
  .finally(() => closeDb())
  .catch((err) => {
    if (isDatabaseConnectionError(err)) logger.error(DATABASE_ERROR_MESSAGE);
    else logger.error('Unhandled error', describeError(err));
    process.exitCode = 1;
  });
