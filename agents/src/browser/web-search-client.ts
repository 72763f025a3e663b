/**
 * Open-web search client used to discover interview-prep pages.
 * searchWeb: SerpAPI when SERPAPI_KEY is set; [] otherwise.
 * Callers use returned URLs to fetch and score content.
 */

import { z } from 'zod';
import { createLogger, describeError } from '@prepscout/core';
import type { FetchImpl } from './types.js';

export interface SearchResult {
  url: string;
  title: string;
  snippet?: string;
}

export interface SearchClient {
  search(query: string): Promise<SearchResult[]>;
}

const SERPAPI_BASE = 'https://serpapi.com/search';
const DEFAULT_NUM = 10;
const REQUEST_TIMEOUT_MS = 15_000;

const serpResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
  error: z.string().optional(),
});

const logger = createLogger('web-search');

export interface SearchOptions {
  apiKey?: string;
  num?: number;
  fetchImpl?: FetchImpl;
}

/**
 * Run a single Google search via SerpAPI and return organic result links.
 * Returns [] if the key is missing, the request fails, or there are no organic results.
 */
export async function searchWeb(query: string, options?: SearchOptions): Promise<SearchResult[]> {
  const apiKey = (options?.apiKey ?? process.env.SERPAPI_KEY ?? '').trim();
  const q = query.trim();
  if (!apiKey || !q) return [];

  const params = new URLSearchParams({
    engine: 'google',
    q,
    api_key: apiKey,
    num: String(options?.num ?? DEFAULT_NUM),
  });
  const doFetch: FetchImpl = options?.fetchImpl ?? ((input, init) => fetch(input, init));

  try {
    const res = await doFetch(`${SERPAPI_BASE}?${params.toString()}`, {
      method: 'GET',
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      headers: { Accept: 'application/json' },
    });
    if (!res.ok) {
      await res.body?.cancel();
      logger.warn(`Search HTTP ${res.status} for "${q}"`);
      return [];
    }

    const parsed = serpResponseSchema.safeParse(await res.json());
    if (!parsed.success || parsed.data.error) {
      logger.warn(`Search returned no usable results for "${q}"`, parsed.success ? parsed.data.error : undefined);
      return [];
    }

    const results: SearchResult[] = [];
    const seen = new Set<string>();
    for (const item of parsed.data.organic_results ?? []) {
      const link = item.link?.trim();
      if (!link || seen.has(link) || !/^https?:\/\//i.test(link)) continue;
      seen.add(link);
      results.push({ url: link, title: item.title?.trim() ?? '', snippet: item.snippet?.trim() });
    }
    return results;
  } catch (err) {
    logger.warn(`Search failed for "${q}"`, describeError(err));
    return [];
  }
}

export function createSerpApiClient(options: SearchOptions = {}): SearchClient {
  return { search: (query) => searchWeb(query, options) };
}

/**
 * Check if the search API is configured (e.g. for fallback logic).
 */
export function isSearchConfigured(apiKey: string | undefined = process.env.SERPAPI_KEY): boolean {
  return typeof apiKey === 'string' && apiKey.trim().length > 0;
}
