/**
 * Browser - page retrieval
 *
 * - ContentFetcher: cache-first fetch, lightweight or rendered, with retry on rendered
 * - openBrowserSession: shared Playwright context for rendered fetches
 * - normalizeHtml / buildContentItem: HTML → ContentItem
 * - MemoryContentCache: in-process cache store
 * - searchWeb: SerpAPI search for discovering pages
 * - searchGitHubRepos / searchReddit: keyless search clients (README pages, threads)
 */

export * from './content-fetcher.js';
export * from './browser-session.js';
export * from './html-normalizer.js';
export * from './memory-cache.js';
export * from './web-search-client.js';
export * from './github-search-client.js';
export * from './reddit-search-client.js';
export * from './types.js';
