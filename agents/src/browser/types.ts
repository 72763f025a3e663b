/**
 * Browser module types: the seams the content fetcher is built from.
 */

import type { CachePayload, FetchStrategy } from '@prepscout/schemas';

export type { FetchStrategy };

/** Key-value page cache. `get` returns whatever was stored; the fetcher validates it. */
export interface ContentCacheStore {
  get(url: string): Promise<unknown>;
  put(url: string, payload: CachePayload): Promise<void>;
}

/** Permit source shared by all lightweight fetches. */
export interface RateLimiter {
  take(): Promise<void>;
}

/** Bounds concurrent connections, overall and per host. */
export interface ConnectionPool {
  run<T>(host: string, fn: () => Promise<T>): Promise<T>;
}

/** The slice of a Playwright `Page` the rendered strategy uses. */
export interface RenderPage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  content(): Promise<string>;
  title(): Promise<string>;
  close(): Promise<void>;
}

/** The slice of a Playwright `BrowserContext` the rendered strategy uses. */
export interface RenderContext {
  newPage(): Promise<RenderPage>;
}

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface PageContent {
  title: string;
  body: string;
}
