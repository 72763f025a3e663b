/**
 * @prepscout/agents - pipeline stages
 *
 * - browser/   : cache-first content fetching, browser session, web search
 * - rank/      : relevance scoring for pages and candidate questions
 * - normalize/ : candidate normalization, dedupe, summary
 * - context/   : token-budgeted context compression
 * - enhance/   : bounded concurrent answer enhancement
 * - mine/      : search → fetch → score → persist → compress orchestration
 * - shared/    : BaseAgent and agent types
 */

export * from './shared/index.js';
export * from './browser/index.js';
export * from './rank/index.js';
export * from './normalize/index.js';
export * from './context/index.js';
export * from './enhance/index.js';
export * from './mine/index.js';
