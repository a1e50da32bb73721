import type { MetadataValue } from '../../domain/rag/passage.js';

export type VectorMetadata = Record<string, MetadataValue>;

export interface VectorMatch {
  id: string;
  score: number;
  metadata: VectorMetadata;
}

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

/**
 * Nearest-neighbour search over the knowledge-base embeddings.
 * Higher scores mean more similar.
 */
export interface VectorIndexClient {
  search(vector: number[], topN: number, signal?: AbortSignal): Promise<VectorMatch[]>;
}

export class VectorIndexError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VectorIndexError';
  }
}
