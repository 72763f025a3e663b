import type { Logger } from '@prepscout/core';
import type { CandidateItem } from '@prepscout/schemas';

/** Content the pool can draw on. ContentItem fits. */
export interface EnhancementSource {
  title?: string;
  body: string;
}

export interface EnhancementRequest {
  candidate: CandidateItem;
  /** Best-matching content, at most 1000 chars. */
  context: string;
  prompt: string;
}

/** External text-generation step; resolves to the new answer text. */
export interface CandidateEnhancer {
  enhance(request: EnhancementRequest): Promise<string>;
}

export interface EnhanceOptions {
  concurrency?: number;
  logger?: Logger;
}
