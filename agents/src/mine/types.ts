/**
 * Mine module types
 */

import { z } from 'zod';
import {
  compressionResultSchema,
  contentItemSchema,
  fetchStrategyEnum,
  jobProfileSchema,
  type SearchResultRow,
} from '@prepscout/schemas';

export const minerInputSchema = z.object({
  profile: jobProfileSchema,
  seedUrls: z.array(z.string().url()).default([]),
  /** Explicit queries; built from the profile when omitted. */
  queries: z.array(z.string().min(1)).optional(),
  /** Fixed strategy for every URL; when omitted each URL goes lightweight, then rendered. */
  strategy: fetchStrategyEnum.optional(),
  /** Also try the well-known "<role>-interview-questions" pages. */
  includeCommonPatterns: z.boolean().default(false),
  /** Mine the built-in question-bank catalogue when no seed URLs are given. */
  useDirectSources: z.boolean().default(true),
});

export type MinerInput = z.infer<typeof minerInputSchema>;

export const minerStatsSchema = z.object({
  queries: z.number().int().min(0),
  searchCalls: z.number().int().min(0),
  freeSearchCalls: z.number().int().min(0),
  discovered: z.number().int().min(0),
  fetched: z.number().int().min(0),
  failed: z.number().int().min(0),
  kept: z.number().int().min(0),
  persisted: z.number().int().min(0),
});

export type MinerStats = z.infer<typeof minerStatsSchema>;

export const minerOutputSchema = z.object({
  items: z.array(contentItemSchema),
  context: compressionResultSchema,
  stats: minerStatsSchema,
});

export type MinerOutput = z.infer<typeof minerOutputSchema>;

/** Where retained results are recorded. */
export interface SearchResultSink {
  append(row: SearchResultRow): Promise<void>;
}
