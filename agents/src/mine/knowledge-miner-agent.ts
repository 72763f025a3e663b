/**
 * Knowledge Miner Agent - gathers interview-prep material for a job profile
 *
 * Flow:
 * 1. Build search queries from the profile (unless given)
 * 2. Resolve queries to URLs via the search client, within a per-run call budget
 * 3. Ask the keyless clients (GitHub, Reddit) with role queries; no budget
 * 4. Fetch seed (or catalogue) + discovered URLs, deduplicated by normalized URL
 * 5. Score, keep > 0.3, best first, top 20
 * 6. Record kept items in the results sink
 * 7. Compress the kept items into prompt context
 */

import { DIRECT_SOURCES, SEARCH_DOMAINS, describeError, normalizeUrl, runPool } from '@prepscout/core';
import { searchResultRowSchema, type ContentItem, type JobProfile } from '@prepscout/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import type { ContentFetcher } from '../browser/content-fetcher.js';
import type { SearchClient } from '../browser/web-search-client.js';
import { scoreRelevance } from '../rank/relevance-scorer.js';
import { compressContext } from '../context/context-compressor.js';
import type { CompressionOptions } from '../context/types.js';
import {
  minerInputSchema,
  minerOutputSchema,
  type MinerInput,
  type MinerOutput,
  type SearchResultSink,
} from './types.js';

export const KEEP_SCORE_FLOOR = 0.3;
export const MAX_KEPT_ITEMS = 20;
export const MAX_QUERIES = 10;
const QUERY_SKILLS = 3;
const QUERY_SITES = 5;

export interface KnowledgeMinerDeps {
  fetcher: Pick<ContentFetcher, 'fetch' | 'fetchWithFallback'>;
  search?: SearchClient | null;
  /** Keyless clients asked with role queries outside the search budget. */
  freeSearch?: readonly SearchClient[];
  sink?: SearchResultSink | null;
  /** Search calls allowed per run. */
  maxSearchCalls?: number;
  /** Result links taken from each search. */
  resultsPerQuery?: number;
  /** Concurrent page fetches. */
  fetchConcurrency?: number;
  compression?: CompressionOptions;
}

export function buildSearchQueries(profile: Pick<JobProfile, 'role' | 'skills'>): string[] {
  const role = profile.role.trim();
  const queries = [
    `"${role}" interview questions`,
    `"${role}" technical interview`,
    `"${role}" coding interview questions`,
  ];
  for (const skill of profile.skills.slice(0, QUERY_SKILLS)) {
    queries.push(`"${skill}" interview questions`, `"${skill}" technical interview`);
  }
  for (const domain of SEARCH_DOMAINS.slice(0, QUERY_SITES)) {
    queries.push(`site:${domain} "${role}" interview questions`);
  }
  return [...new Set(queries)].slice(0, MAX_QUERIES);
}

/** Queries for the keyless clients. */
export function freeSearchQueries(role: string): string[] {
  const r = role.trim();
  return [`${r} interview questions`, `${r} technical interview`];
}

export function directSourceUrls(): string[] {
  return Object.values(DIRECT_SOURCES).flat();
}

/** Conventional question-bank pages named after the role. */
export function commonPatternUrls(role: string): string[] {
  const slug = role.trim().toLowerCase().replace(/\s+/g, '-');
  return [
    `https://www.geeksforgeeks.org/${slug}-interview-questions/`,
    `https://www.interviewbit.com/${slug}-interview-questions/`,
    `https://www.tutorialspoint.com/${slug}-interview-questions/`,
  ];
}

/** Score, drop weak items, best first, capped. Returns new objects. */
export function selectRelevant(items: readonly ContentItem[], profile: JobProfile): ContentItem[] {
  return items
    .map((item) => ({ ...item, relevanceScore: scoreRelevance(item, profile) }))
    .filter((item) => item.relevanceScore > KEEP_SCORE_FLOOR)
    .sort((a, b) => b.relevanceScore - a.relevanceScore)
    .slice(0, MAX_KEPT_ITEMS);
}

export class KnowledgeMinerAgent extends BaseAgent<MinerInput, MinerOutput> {
  config: AgentConfig = {
    name: 'knowledge-miner',
    description: 'Searches, fetches, scores and compresses interview-prep content for a job profile',
    version: '1.0.0',
  };
  inputSchema = minerInputSchema;
  outputSchema = minerOutputSchema;

  private readonly maxSearchCalls: number;
  private readonly resultsPerQuery: number;
  private readonly fetchConcurrency: number;

  constructor(private readonly deps: KnowledgeMinerDeps) {
    super();
    this.maxSearchCalls = deps.maxSearchCalls ?? 5;
    this.resultsPerQuery = deps.resultsPerQuery ?? 3;
    this.fetchConcurrency = deps.fetchConcurrency ?? 10;
  }

  protected async run(input: MinerInput, _context: AgentContext): Promise<MinerOutput> {
    const { profile } = input;
    this.info(`Mining for ${profile.role}${profile.company ? ` at ${profile.company}` : ''}`);

    const queries = input.queries ?? buildSearchQueries(profile);
    const paid = await this.discover(queries);
    const free = await this.discoverFree(profile.role);
    const discovered = [...paid.urls, ...free.urls];

    const seeds =
      input.seedUrls.length > 0 ? input.seedUrls : input.useDirectSources ? directSourceUrls() : [];
    const candidates = [
      ...seeds,
      ...(input.includeCommonPatterns ? commonPatternUrls(profile.role) : []),
      ...discovered,
    ];
    const urls = uniqueByNormalizedUrl(candidates);
    this.debug(`Fetching ${urls.length} URLs`);

    const fetched = await runPool(
      urls,
      (url) =>
        input.strategy ? this.deps.fetcher.fetch(url, input.strategy) : this.deps.fetcher.fetchWithFallback(url),
      { concurrency: this.fetchConcurrency },
    );
    const pages = fetched.filter((item): item is ContentItem => item !== null);

    const kept = selectRelevant(pages, profile);
    const persisted = await this.persist(kept, profile);
    const context = compressContext(kept, this.deps.compression);

    this.info(`Kept ${kept.length} of ${pages.length} fetched pages (${urls.length - pages.length} failed)`);

    return {
      items: kept,
      context,
      stats: {
        queries: queries.length,
        searchCalls: paid.calls,
        freeSearchCalls: free.calls,
        discovered: discovered.length,
        fetched: pages.length,
        failed: urls.length - pages.length,
        kept: kept.length,
        persisted,
      },
    };
  }

  private async discover(queries: readonly string[]): Promise<{ urls: string[]; calls: number }> {
    const search = this.deps.search;
    if (!search) {
      this.debug('No search client; using seed URLs only');
      return { urls: [], calls: 0 };
    }

    const urls: string[] = [];
    let calls = 0;
    for (const query of queries) {
      if (calls >= this.maxSearchCalls) {
        this.info(`Search budget of ${this.maxSearchCalls} calls reached`);
        break;
      }
      calls++;
      try {
        const results = await search.search(query);
        urls.push(...results.slice(0, this.resultsPerQuery).map((r) => r.url));
      } catch (err) {
        this.warn(`Search failed for "${query}"`, describeError(err));
      }
    }
    return { urls, calls };
  }

  private async discoverFree(role: string): Promise<{ urls: string[]; calls: number }> {
    const clients = this.deps.freeSearch ?? [];
    const urls: string[] = [];
    let calls = 0;
    for (const client of clients) {
      for (const query of freeSearchQueries(role)) {
        calls++;
        try {
          const results = await client.search(query);
          urls.push(...results.map((r) => r.url));
        } catch (err) {
          this.warn(`Free search failed for "${query}"`, describeError(err));
        }
      }
    }
    return { urls, calls };
  }

  private async persist(items: readonly ContentItem[], profile: JobProfile): Promise<number> {
    const sink = this.deps.sink;
    if (!sink) return 0;

    let persisted = 0;
    for (const item of items) {
      try {
        const row = searchResultRowSchema.parse({
          role: profile.role,
          company: profile.company,
          url: item.url,
          title: item.title,
          body: item.body,
          source: item.source,
          relevanceScore: item.relevanceScore,
        });
        await sink.append(row);
        persisted++;
      } catch (err) {
        this.warn(`Failed to record result ${item.url}`, describeError(err));
      }
    }
    return persisted;
  }
}

function uniqueByNormalizedUrl(urls: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const url of urls) {
    const key = normalizeUrl(url);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(url);
  }
  return out;
}
