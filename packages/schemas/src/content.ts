import { z } from 'zod';

export const BODY_CHAR_LIMIT = 5000;

export const contentItemSchema = z.object({
  url: z.string().url(),
  title: z.string(),
  body: z.string().max(BODY_CHAR_LIMIT),
  source: z.string(),
  relevanceScore: z.number().min(0).max(1).default(0),
  fetchedAt: z.string().datetime(),
});

export type ContentItem = z.infer<typeof contentItemSchema>;

export const CACHE_PAYLOAD_VERSION = 1;

/** Serialized cache value. Bump the version when ContentItem changes shape. */
export const cachePayloadSchema = z.object({
  version: z.literal(CACHE_PAYLOAD_VERSION),
  item: contentItemSchema,
});

export type CachePayload = z.infer<typeof cachePayloadSchema>;

/** One row appended to the search-results sink per retained content item. */
export const searchResultRowSchema = z.object({
  role: z.string(),
  company: z.string(),
  url: z.string(),
  title: z.string(),
  body: z.string(),
  source: z.string(),
  relevanceScore: z.number().min(0).max(1),
});

export type SearchResultRow = z.infer<typeof searchResultRowSchema>;
