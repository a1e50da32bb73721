import type { VectorIndexClient, VectorMatch, VectorMetadata } from './types.js';
import { VectorIndexError } from './types.js';
import { CancelledError } from '../../domain/generation/errors.js';

export interface HttpVectorIndexOptions {
  /** Index host, e.g. https://<index>-<project>.svc.<region>.pinecone.io */
  host: string;
  apiKey?: string;
  namespace?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Pick<Console, 'warn'>;
}

function toMetadata(raw: unknown): VectorMetadata {
  const metadata: VectorMetadata = {};
  if (typeof raw !== 'object' || raw === null) {
    return metadata;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'boolean') {
      metadata[key] = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      metadata[key] = value;
    }
  }
  return metadata;
}

/**
 * Queries a serverless vector index over its REST data-plane API.
 */
export class HttpVectorIndexClient implements VectorIndexClient {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Pick<Console, 'warn'>;

  constructor(private readonly options: HttpVectorIndexOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? console;
  }

  async search(vector: number[], topN: number, signal?: AbortSignal): Promise<VectorMatch[]> {
    const timeout = AbortSignal.timeout(this.options.timeoutMs ?? 15000);
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Pinecone-API-Version': '2024-10',
    };
    if (this.options.apiKey) {
      headers['Api-Key'] = this.options.apiKey;
    }

    const body: Record<string, unknown> = { vector, topK: topN, includeMetadata: true };
    if (this.options.namespace) {
      body.namespace = this.options.namespace;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.host.replace(/\/+$/, '')}/query`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: requestSignal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new VectorIndexError(`Vector index request failed: ${message}`, undefined, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new VectorIndexError(
        `Vector index error (${response.status}): ${detail || response.statusText}`,
        response.status
      );
    }

    const data: unknown = await response.json().catch(() => null);
    const rawMatches = typeof data === 'object' && data !== null && 'matches' in data ? data.matches : undefined;
    if (!Array.isArray(rawMatches)) {
      throw new VectorIndexError('Vector index response has no matches array');
    }

    const matches: VectorMatch[] = [];
    for (const entry of rawMatches) {
      const match = this.toMatch(entry);
      if (match) {
        matches.push(match);
      } else {
        this.logger.warn('[VectorIndex] Skipping malformed match:', JSON.stringify(entry));
      }
    }
    return matches;
  }

  private toMatch(entry: unknown): VectorMatch | null {
    if (typeof entry !== 'object' || entry === null) {
      return null;
    }
    const id = 'id' in entry ? entry.id : undefined;
    const score = 'score' in entry ? entry.score : undefined;
    if (typeof id !== 'string' || !id || typeof score !== 'number' || !Number.isFinite(score)) {
      return null;
    }
    return { id, score, metadata: toMetadata('metadata' in entry ? entry.metadata : undefined) };
  }
}
