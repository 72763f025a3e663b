import { z } from 'zod';

/**
 * Structured view of a job description, produced upstream by the parser.
 * Skills keep their original casing; matching is case-insensitive.
 */
export const jobProfileSchema = z.object({
  role: z.string().min(1),
  company: z.string().default(''),
  skills: z.array(z.string()).default([]),
  experienceYears: z.number().int().min(0).default(0),
  location: z.string().optional(),
});

export type JobProfile = z.infer<typeof jobProfileSchema>;
