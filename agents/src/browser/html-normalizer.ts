/**
 * HTML → plain text for scoring and caching.
 *
 * Drops page chrome and non-content tags, collapses whitespace and caps the
 * body length. Title comes from <title> unless the caller already has one
 * (the rendered strategy passes the live page title).
 */

import { parse } from 'node-html-parser';
import { NO_TITLE, sourceLabelFor } from '@prepscout/core';
import { BODY_CHAR_LIMIT, type ContentItem } from '@prepscout/schemas';
import type { PageContent } from './types.js';

const STRIP_SELECTOR = 'script, style, nav, footer, header, noscript';

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** First `limit` UTF-16 units, without a dangling high surrogate at the cut. */
export function truncateText(text: string, limit: number): string {
  const cut = text.slice(0, Math.max(0, limit));
  return /[\uD800-\uDBFF]$/.test(cut) ? cut.slice(0, -1) : cut;
}

export function normalizeHtml(
  html: string,
  options: { title?: string; bodyCharLimit?: number } = {},
): PageContent {
  const root = parse(html);
  const limit = Math.min(options.bodyCharLimit ?? BODY_CHAR_LIMIT, BODY_CHAR_LIMIT);

  const docTitle = collapseWhitespace(root.querySelector('title')?.text ?? '');
  const title = collapseWhitespace(options.title ?? '') || docTitle || NO_TITLE;

  for (const el of root.querySelectorAll(STRIP_SELECTOR)) el.remove();
  const container = root.querySelector('body');
  if (!container) {
    for (const el of root.querySelectorAll('head, title')) el.remove();
  }

  const body = truncateText(collapseWhitespace((container ?? root).structuredText), limit);
  return { title, body };
}

export function buildContentItem(
  url: string,
  html: string,
  options: { title?: string; bodyCharLimit?: number; fetchedAt?: Date } = {},
): ContentItem {
  const { title, body } = normalizeHtml(html, options);
  return {
    url,
    title,
    body,
    source: sourceLabelFor(url),
    relevanceScore: 0,
    fetchedAt: (options.fetchedAt ?? new Date()).toISOString(),
  };
}
