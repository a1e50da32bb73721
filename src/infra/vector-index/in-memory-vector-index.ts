import type { VectorIndexClient, VectorMatch, VectorRecord } from './types.js';
import { VectorIndexError } from './types.js';
import { throwIfAborted } from '../../domain/generation/errors.js';

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new VectorIndexError(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Process-local index with exhaustive cosine search. Used for local runs and tests.
 */
export class InMemoryVectorIndex implements VectorIndexClient {
  private records = new Map<string, VectorRecord>();

  get size(): number {
    return this.records.size;
  }

  upsert(records: VectorRecord[]): void {
    for (const record of records) {
      this.records.set(record.id, {
        id: record.id,
        values: [...record.values],
        metadata: { ...record.metadata },
      });
    }
  }

  remove(id: string): boolean {
    return this.records.delete(id);
  }

  async search(vector: number[], topN: number, signal?: AbortSignal): Promise<VectorMatch[]> {
    throwIfAborted(signal);

    const matches: VectorMatch[] = [];
    for (const record of this.records.values()) {
      matches.push({
        id: record.id,
        score: cosineSimilarity(vector, record.values),
        metadata: { ...record.metadata },
      });
    }

    matches.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return matches.slice(0, Math.max(0, topN));
  }
}
