import { z } from 'zod';
import { difficultyEnum } from './enums';

/**
 * A generated interview question awaiting dedupe and scoring.
 * Missing optional fields fall back to defaults instead of failing.
 */
export const candidateItemSchema = z.object({
  text: z.string().min(1),
  answer: z.string().default(''),
  category: z.string().min(1).default('Technical'),
  difficulty: difficultyEnum.default('medium'),
  skills: z.array(z.string()).default([]),
  relevanceScore: z.number().min(0).max(1).default(0),
  source: z.string().optional(),
  enhanced: z.boolean().optional(),
});

export type CandidateItem = z.infer<typeof candidateItemSchema>;
export type CandidateItemInput = z.input<typeof candidateItemSchema>;
