export interface CompressionOptions {
  maxTokens?: number;
  perItemCharLimit?: number;
  minRelevance?: number;
}

export interface CompressionStats {
  /** compressed chars / original extracted chars; 0 when there was nothing to compress. */
  compressionRatio: number;
  /** Percentage. */
  sizeReduction: number;
  originalChars: number;
  compressedChars: number;
  originalPieces: number;
  compressedPieces: number;
  relevanceDistribution: { high: number; medium: number; low: number };
  sourceDistribution: Record<string, number>;
}
