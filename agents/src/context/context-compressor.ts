/**
 * Context Compressor - packs ranked content into a bounded prompt context
 *
 * Items under the relevance floor are dropped, the rest go in best-first,
 * each cleaned and trimmed to a per-item limit, until the character budget
 * (maxTokens × 4) is used up. Pieces are labelled "Source N:".
 */

import { CHARS_PER_TOKEN, createLogger } from '@prepscout/core';
import type { CompressionResult, ScoredItem } from '@prepscout/schemas';
import type { CompressionOptions, CompressionStats } from './types.js';

export const DEFAULT_COMPRESSION = {
  maxTokens: 3000,
  perItemCharLimit: 350,
  minRelevance: 0.3,
} as const;

/** Minimum room left in the budget for a shortened piece to be worth adding. */
const MIN_PARTIAL_ROOM = 100;
const PARTIAL_MARGIN = 50;
const UNKNOWN_SOURCE = 'Unknown';

const logger = createLogger('context-compressor');

export function cleanContentText(text: string): string {
  return text
    .replace(/<[^>]+>/g, ' ')
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, '-')
    .replace(/[^\p{L}\p{N}_\s.,!?;:()'"-]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function extractContentText(item: ScoredItem): string {
  for (const field of [item.snippet, item.body]) {
    const text = field?.trim();
    if (text) return cleanContentText(text);
  }
  return '';
}

/**
 * Shorten to `limit` chars, keeping whole sentences when at least one fits.
 */
export function trimToLimit(text: string, limit: number): string {
  if (text.length <= limit) return text;

  let trimmed = '';
  for (const raw of text.split(/[.!?]+/)) {
    const sentence = raw.trim();
    if (!sentence) continue;
    if (trimmed.length + sentence.length + 1 > limit) break;
    trimmed += `${sentence}. `;
  }

  if (trimmed) return trimmed.trim();
  return limit > 3 ? `${text.slice(0, limit - 3)}...` : text.slice(0, Math.max(0, limit));
}

export function compressContext(
  items: readonly ScoredItem[],
  options: CompressionOptions = {},
): CompressionResult {
  const maxTokens = options.maxTokens ?? DEFAULT_COMPRESSION.maxTokens;
  const perItemCharLimit = options.perItemCharLimit ?? DEFAULT_COMPRESSION.perItemCharLimit;
  const minRelevance = options.minRelevance ?? DEFAULT_COMPRESSION.minRelevance;
  const maxChars = maxTokens * CHARS_PER_TOKEN;

  const eligible = items
    .filter((item) => item.relevanceScore >= minRelevance)
    .sort((a, b) => b.relevanceScore - a.relevanceScore);

  const pieces: string[] = [];
  const sourcesUsed: string[] = [];
  let used = 0;
  let effectiveThreshold = minRelevance;

  for (const item of eligible) {
    if (used >= maxChars) break;

    const text = extractContentText(item);
    if (!text) continue;

    let piece = trimToLimit(text, perItemCharLimit);
    if (used + piece.length > maxChars) {
      const remaining = maxChars - used;
      if (remaining <= MIN_PARTIAL_ROOM) break;
      piece = `${piece.slice(0, remaining - PARTIAL_MARGIN)}...`;
    }

    pieces.push(piece);
    used += piece.length;
    effectiveThreshold = item.relevanceScore;

    const source = item.source || UNKNOWN_SOURCE;
    if (!sourcesUsed.includes(source)) sourcesUsed.push(source);
  }

  const text = pieces.map((piece, i) => `Source ${i + 1}: ${piece}`).join('\n\n');
  const result: CompressionResult = {
    text,
    originalCount: items.length,
    acceptedCount: pieces.length,
    estimatedTokens: Math.floor(text.length / CHARS_PER_TOKEN),
    effectiveThreshold,
    sourcesUsed,
  };

  if (eligible.length === 0 && items.length > 0) {
    logger.warn(`No content meets relevance threshold ${minRelevance}`);
  } else {
    logger.info(
      `Compressed ${items.length} -> ${pieces.length} pieces, ~${result.estimatedTokens} tokens, ${sourcesUsed.length} sources`,
    );
  }
  return result;
}

export function compressionStats(
  items: readonly ScoredItem[],
  result: CompressionResult,
): CompressionStats {
  const relevanceDistribution = { high: 0, medium: 0, low: 0 };
  const sourceDistribution: Record<string, number> = {};
  let originalChars = 0;

  for (const item of items) {
    originalChars += extractContentText(item).length;
    if (item.relevanceScore >= 0.7) relevanceDistribution.high++;
    else if (item.relevanceScore >= 0.4) relevanceDistribution.medium++;
    else relevanceDistribution.low++;
    const source = item.source || UNKNOWN_SOURCE;
    sourceDistribution[source] = (sourceDistribution[source] ?? 0) + 1;
  }

  const compressedChars = result.text.length;
  const compressionRatio = originalChars > 0 ? compressedChars / originalChars : 0;

  return {
    compressionRatio,
    sizeReduction: items.length ? (1 - compressionRatio) * 100 : 0,
    originalChars,
    compressedChars,
    originalPieces: items.length,
    compressedPieces: result.acceptedCount,
    relevanceDistribution,
    sourceDistribution,
  };
}
