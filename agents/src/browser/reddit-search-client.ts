/**
 * Reddit thread search through the public JSON listing, one request per subreddit.
 * A failing subreddit is logged and skipped.
 */

import { z } from 'zod';
import { INTERVIEW_SUBREDDITS, createLogger, describeError } from '@prepscout/core';
import { FREE_SEARCH_USER_AGENT } from './github-search-client.js';
import type { FetchImpl } from './types.js';
import type { SearchClient, SearchResult } from './web-search-client.js';

const REDDIT_BASE = 'https://www.reddit.com';
const POSTS_PER_SUBREDDIT = 3;
const REQUEST_TIMEOUT_MS = 15_000;

const listingSchema = z.object({
  data: z.object({
    children: z.array(
      z.object({
        data: z.object({
          permalink: z.string().startsWith('/'),
          title: z.string().optional(),
          selftext: z.string().optional(),
        }),
      }),
    ),
  }),
});

const logger = createLogger('reddit-search');

export interface RedditSearchOptions {
  subreddits?: readonly string[];
  postsPerSubreddit?: number;
  fetchImpl?: FetchImpl;
}

export function subredditSearchUrl(subreddit: string, query: string): string {
  const params = new URLSearchParams({ q: query, restrict_sr: 'on', sort: 'relevance', t: 'year' });
  return `${REDDIT_BASE}/r/${encodeURIComponent(subreddit)}/search.json?${params.toString()}`;
}

export async function searchReddit(query: string, options: RedditSearchOptions = {}): Promise<SearchResult[]> {
  const q = query.trim();
  if (!q) return [];

  const doFetch: FetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const limit = options.postsPerSubreddit ?? POSTS_PER_SUBREDDIT;
  const results: SearchResult[] = [];
  const seen = new Set<string>();

  for (const subreddit of options.subreddits ?? INTERVIEW_SUBREDDITS) {
    try {
      const res = await doFetch(subredditSearchUrl(subreddit, q), {
        method: 'GET',
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        headers: { Accept: 'application/json', 'User-Agent': FREE_SEARCH_USER_AGENT },
      });
      if (!res.ok) {
        await res.body?.cancel();
        logger.warn(`Reddit search HTTP ${res.status} for r/${subreddit}`);
        continue;
      }

      const parsed = listingSchema.safeParse(await res.json());
      if (!parsed.success) {
        logger.warn(`Unexpected Reddit listing for r/${subreddit}`, parsed.error.issues[0]?.message);
        continue;
      }

      for (const { data: post } of parsed.data.data.children.slice(0, limit)) {
        const url = `${REDDIT_BASE}${post.permalink}`;
        if (seen.has(url)) continue;
        seen.add(url);
        results.push({ url, title: post.title?.trim() ?? '', snippet: post.selftext?.trim() || undefined });
      }
    } catch (err) {
      logger.warn(`Reddit search failed for r/${subreddit}`, describeError(err));
    }
  }
  return results;
}

export function createRedditSearchClient(options: RedditSearchOptions = {}): SearchClient {
  return { search: (query) => searchReddit(query, options) };
}
