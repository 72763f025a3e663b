/**
 * GitHub repository search. Each matching repository resolves to its README page,
 * which the fetcher then scrapes like any other URL.
 */

import { z } from 'zod';
import { createLogger, describeError } from '@prepscout/core';
import type { FetchImpl } from './types.js';
import type { SearchClient, SearchResult } from './web-search-client.js';

const GITHUB_SEARCH_URL = 'https://api.github.com/search/repositories';
const REPOS_PER_QUERY = 3;
const REQUEST_TIMEOUT_MS = 15_000;
export const FREE_SEARCH_USER_AGENT = 'prepscout/1.0';

const repoSearchSchema = z.object({
  items: z
    .array(
      z.object({
        html_url: z.string().url(),
        full_name: z.string().optional(),
        description: z.string().nullable().optional(),
        default_branch: z.string().optional(),
      }),
    )
    .default([]),
});

const logger = createLogger('github-search');

export interface GitHubSearchOptions {
  /** Raises the unauthenticated rate limit when set. */
  token?: string;
  reposPerQuery?: number;
  fetchImpl?: FetchImpl;
}

export async function searchGitHubRepos(query: string, options: GitHubSearchOptions = {}): Promise<SearchResult[]> {
  const q = query.trim();
  if (!q) return [];

  const params = new URLSearchParams({ q, sort: 'stars', order: 'desc' });
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github.v3+json',
    'User-Agent': FREE_SEARCH_USER_AGENT,
  };
  const token = options.token?.trim();
  if (token) headers.Authorization = `Bearer ${token}`;
  const doFetch: FetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));

  try {
    const res = await doFetch(`${GITHUB_SEARCH_URL}?${params.toString()}`, {
      method: 'GET',
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      headers,
    });
    if (!res.ok) {
      await res.body?.cancel();
      logger.warn(`GitHub search HTTP ${res.status} for "${q}"`);
      return [];
    }

    const parsed = repoSearchSchema.safeParse(await res.json());
    if (!parsed.success) {
      logger.warn(`Unexpected GitHub search payload for "${q}"`, parsed.error.issues[0]?.message);
      return [];
    }

    return parsed.data.items.slice(0, options.reposPerQuery ?? REPOS_PER_QUERY).map((repo) => ({
      url: `${repo.html_url.replace(/\/+$/, '')}/blob/${repo.default_branch ?? 'main'}/README.md`,
      title: repo.full_name ?? repo.html_url,
      snippet: repo.description ?? undefined,
    }));
  } catch (err) {
    logger.warn(`GitHub search failed for "${q}"`, describeError(err));
    return [];
  }
}

export function createGitHubSearchClient(options: GitHubSearchOptions = {}): SearchClient {
  return { search: (query) => searchGitHubRepos(query, options) };
}
