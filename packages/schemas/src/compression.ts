import { z } from 'zod';

/** Anything the context compressor can pack. ContentItem satisfies this. */
export const scoredItemSchema = z.object({
  relevanceScore: z.number(),
  source: z.string().optional(),
  title: z.string().optional(),
  snippet: z.string().optional(),
  body: z.string().optional(),
});

export type ScoredItem = z.infer<typeof scoredItemSchema>;

export const compressionResultSchema = z.object({
  text: z.string(),
  originalCount: z.number().int().min(0),
  acceptedCount: z.number().int().min(0),
  estimatedTokens: z.number().int().min(0),
  effectiveThreshold: z.number(),
  sourcesUsed: z.array(z.string()),
});

export type CompressionResult = z.infer<typeof compressionResultSchema>;
