import { z } from 'zod';

export const difficultyEnum = z.enum(['easy', 'medium', 'hard']);
export type Difficulty = z.infer<typeof difficultyEnum>;

export const fetchStrategyEnum = z.enum(['lightweight', 'rendered']);
export type FetchStrategy = z.infer<typeof fetchStrategyEnum>;

export const scoringStrategyEnum = z.enum(['fuzzy', 'heuristic']);
export type ScoringStrategy = z.infer<typeof scoringStrategyEnum>;
