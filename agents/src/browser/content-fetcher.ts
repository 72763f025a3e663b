/**
 * Content Fetcher - cache-first page retrieval
 *
 * Strategies:
 * - lightweight: single GET through the shared rate limiter and connection pool, no retry
 * - rendered: page in a shared browsing context, settle, extract; retried on a fixed schedule
 *
 * Every failure is logged with URL and cause and surfaces as null.
 */

import {
  HostPool,
  RENDER_RETRY_DELAYS_MS,
  TokenBucket,
  DEFAULT_USER_AGENT,
  createLogger,
  describeError,
  fixedDelayPolicy,
  hostOf,
  retryWithPolicy,
  runPool,
  sleep as defaultSleep,
  type AppConfig,
  type Logger,
  type RetryPolicy,
  type Sleep,
} from '@prepscout/core';
import { CACHE_PAYLOAD_VERSION, cachePayloadSchema, type ContentItem } from '@prepscout/schemas';
import { buildContentItem } from './html-normalizer.js';
import type {
  ConnectionPool,
  ContentCacheStore,
  FetchImpl,
  FetchStrategy,
  RateLimiter,
  RenderContext,
  RenderPage,
} from './types.js';

export interface ContentFetcherOptions {
  cache: ContentCacheStore;
  limiter?: RateLimiter;
  pool?: ConnectionPool;
  /** Required for the rendered strategy; without it rendered fetches return null. */
  renderContext?: RenderContext | null;
  fetchImpl?: FetchImpl;
  now?: () => Date;
  sleep?: Sleep;
  retryPolicy?: RetryPolicy;
  fetchTimeoutMs?: number;
  renderTimeoutMs?: number;
  renderSettleMs?: number;
  bodyCharLimit?: number;
  /** Fan-out for fetchMany. */
  batchConcurrency?: number;
  userAgent?: string;
  logger?: Logger;
}

const DEFAULTS = {
  fetchTimeoutMs: 10_000,
  renderTimeoutMs: 30_000,
  renderSettleMs: 2_000,
  bodyCharLimit: 5_000,
  batchConcurrency: 10,
};

export class ContentFetcher {
  private readonly cache: ContentCacheStore;
  private readonly limiter: RateLimiter;
  private readonly pool: ConnectionPool;
  private readonly renderContext: RenderContext | null;
  private readonly fetchImpl: FetchImpl;
  private readonly now: () => Date;
  private readonly sleep: Sleep;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly settings: typeof DEFAULTS & { userAgent: string };

  constructor(options: ContentFetcherOptions) {
    this.cache = options.cache;
    this.limiter = options.limiter ?? new TokenBucket({ ratePerSecond: 2 });
    this.pool = options.pool ?? new HostPool({ maxConnections: 10, maxPerHost: 5 });
    this.renderContext = options.renderContext ?? null;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.retryPolicy = options.retryPolicy ?? fixedDelayPolicy(RENDER_RETRY_DELAYS_MS);
    this.logger = options.logger ?? createLogger('content-fetcher');
    this.settings = {
      fetchTimeoutMs: options.fetchTimeoutMs ?? DEFAULTS.fetchTimeoutMs,
      renderTimeoutMs: options.renderTimeoutMs ?? DEFAULTS.renderTimeoutMs,
      renderSettleMs: options.renderSettleMs ?? DEFAULTS.renderSettleMs,
      bodyCharLimit: options.bodyCharLimit ?? DEFAULTS.bodyCharLimit,
      batchConcurrency: options.batchConcurrency ?? DEFAULTS.batchConcurrency,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    };
  }

  /** Build a fetcher whose limits come from loaded configuration. */
  static fromConfig(
    config: AppConfig,
    deps: Pick<ContentFetcherOptions, 'cache' | 'renderContext' | 'fetchImpl' | 'logger'>,
  ): ContentFetcher {
    return new ContentFetcher({
      ...deps,
      limiter: new TokenBucket({ ratePerSecond: config.RATE_LIMIT_PER_SECOND }),
      pool: new HostPool({
        maxConnections: config.POOL_MAX_CONNECTIONS,
        maxPerHost: config.POOL_MAX_PER_HOST,
      }),
      fetchTimeoutMs: config.FETCH_TIMEOUT_MS,
      renderTimeoutMs: config.RENDER_TIMEOUT_MS,
      renderSettleMs: config.RENDER_SETTLE_MS,
      bodyCharLimit: config.BODY_CHAR_LIMIT,
      batchConcurrency: config.POOL_MAX_CONNECTIONS,
    });
  }

  get canRender(): boolean {
    return this.renderContext !== null;
  }

  async fetch(url: string, strategy: FetchStrategy = 'lightweight'): Promise<ContentItem | null> {
    const cached = await this.readCache(url);
    if (cached) {
      this.logger.debug(`Cache hit: ${url}`);
      return cached;
    }

    const item =
      strategy === 'rendered' ? await this.fetchRendered(url) : await this.fetchLightweight(url);
    if (!item) return null;

    await this.writeCache(url, item);
    return item;
  }

  /** Fetch a batch. Output keeps input order; failed URLs are dropped. */
  async fetchMany(urls: readonly string[], strategy: FetchStrategy = 'lightweight'): Promise<ContentItem[]> {
    const results = await runPool(urls, (url) => this.fetch(url, strategy), {
      concurrency: this.settings.batchConcurrency,
    });
    return results.filter((item): item is ContentItem => item !== null);
  }

  /** Lightweight first; rendered when that fails and a browsing context is available. */
  async fetchWithFallback(url: string): Promise<ContentItem | null> {
    const light = await this.fetch(url, 'lightweight');
    if (light || !this.canRender) return light;
    this.logger.info(`Lightweight fetch failed, trying rendered: ${url}`);
    return this.fetch(url, 'rendered');
  }

  private async readCache(url: string): Promise<ContentItem | null> {
    let raw: unknown;
    try {
      raw = await this.cache.get(url);
    } catch (err) {
      this.logger.warn(`Cache read failed for ${url}`, describeError(err));
      return null;
    }
    if (raw === null || raw === undefined) return null;

    let value: unknown = raw;
    if (typeof raw === 'string') {
      try {
        value = JSON.parse(raw);
      } catch (err) {
        this.logger.debug(`Unparseable cache payload for ${url}`, describeError(err));
        return null;
      }
    }

    const parsed = cachePayloadSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.debug(`Invalid cache payload for ${url}: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      return null;
    }
    return parsed.data.item;
  }

  private async writeCache(url: string, item: ContentItem): Promise<void> {
    try {
      await this.cache.put(url, { version: CACHE_PAYLOAD_VERSION, item });
    } catch (err) {
      this.logger.warn(`Cache write failed for ${url}`, describeError(err));
    }
  }

  private async fetchLightweight(url: string): Promise<ContentItem | null> {
    const host = hostOf(url);
    if (!host) {
      this.logger.warn(`Invalid URL: ${url}`);
      return null;
    }

    try {
      await this.limiter.take();
      const page = await this.pool.run(host, async () => {
        const res = await this.fetchImpl(url, {
          method: 'GET',
          redirect: 'follow',
          signal: AbortSignal.timeout(this.settings.fetchTimeoutMs),
          headers: {
            'User-Agent': this.settings.userAgent,
            Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          },
        });
        if (!res.ok) {
          await res.body?.cancel();
          return { ok: false as const, status: res.status };
        }
        return { ok: true as const, html: await res.text() };
      });

      if (!page.ok) {
        this.logger.warn(`HTTP ${page.status} for ${url}`);
        return null;
      }
      return buildContentItem(url, page.html, {
        bodyCharLimit: this.settings.bodyCharLimit,
        fetchedAt: this.now(),
      });
    } catch (err) {
      this.logger.warn(`Lightweight fetch failed for ${url}`, describeError(err));
      return null;
    }
  }

  private async fetchRendered(url: string): Promise<ContentItem | null> {
    const context = this.renderContext;
    if (!context) {
      this.logger.warn(`Rendered fetch requested without a browsing context: ${url}`);
      return null;
    }

    const { maxAttempts } = this.retryPolicy;
    const outcome = await retryWithPolicy(() => this.renderOnce(context, url), this.retryPolicy, {
      sleep: this.sleep,
      onFailure: (attempt, err, delayMs) =>
        this.logger.warn(
          `Rendered fetch attempt ${attempt}/${maxAttempts} failed for ${url}; waiting ${delayMs}ms`,
          describeError(err),
        ),
    });

    if (!outcome.ok) {
      this.logger.error(
        `Rendered fetch gave up after ${outcome.attempts} attempts: ${url}`,
        describeError(outcome.error),
      );
      return null;
    }
    return outcome.value;
  }

  private async renderOnce(context: RenderContext, url: string): Promise<ContentItem> {
    const page = await context.newPage();
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.settings.renderTimeoutMs });
      await this.sleep(this.settings.renderSettleMs);
      const html = await page.content();
      const title = await page.title();
      return buildContentItem(url, html, {
        title,
        bodyCharLimit: this.settings.bodyCharLimit,
        fetchedAt: this.now(),
      });
    } finally {
      await this.closePage(page, url);
    }
  }

  private async closePage(page: RenderPage, url: string): Promise<void> {
    try {
      await page.close();
    } catch (err) {
      this.logger.warn(`Failed to close page for ${url}`, describeError(err));
    }
  }
}
