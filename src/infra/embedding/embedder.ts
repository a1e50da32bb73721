/**
 * Embedder
 *
 * Turns query text into a dense vector for knowledge-base search.
 */

import { withRetry } from '../retry/retry-policy.js';
import { CancelledError } from '../../domain/generation/errors.js';

export const MAX_EMBEDDING_INPUT_CHARS = 8000;

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly recoverable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EmbeddingError';
  }
}

export interface HttpEmbedderOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  /** Expected vector length; unchecked when omitted */
  dimension?: number;
  inputType?: 'query' | 'passage';
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Pick<Console, 'warn'>;
}

/**
 * Client for a hosted inference `/embed` endpoint (Pinecone inference API shape).
 */
export class HttpEmbedder implements Embedder {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Pick<Console, 'warn'>;

  constructor(private readonly options: HttpEmbedderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? console;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const input = text.trim().slice(0, MAX_EMBEDDING_INPUT_CHARS);
    if (!input) {
      throw new EmbeddingError('Cannot embed empty text');
    }

    return withRetry(() => this.request(input, signal), {
      config: {
        maxRetries: this.options.maxRetries ?? 2,
        baseDelayMs: this.options.retryBaseDelayMs ?? 500,
      },
      shouldRetry: error => error instanceof EmbeddingError && error.recoverable,
      signal,
      onRetry: (error, attempt, delayMs) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`[Embedder] Attempt ${attempt} failed (${message}), retrying in ${delayMs}ms`);
      },
    });
  }

  private async request(input: string, signal?: AbortSignal): Promise<number[]> {
    const timeoutMs = this.options.timeoutMs ?? 15000;
    const timeout = AbortSignal.timeout(timeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Pinecone-API-Version': '2024-10',
    };
    if (this.options.apiKey) {
      headers['Api-Key'] = this.options.apiKey;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl.replace(/\/+$/, '')}/embed`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.options.model,
          inputs: [{ text: input }],
          parameters: { input_type: this.options.inputType ?? 'query', truncate: 'END' },
        }),
        signal: requestSignal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new EmbeddingError(`Embedding request failed: ${message}`, undefined, true, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      const recoverable = response.status === 429 || response.status >= 500;
      throw new EmbeddingError(
        `Embedding API error (${response.status}): ${detail || response.statusText}`,
        response.status,
        recoverable
      );
    }

    const data: unknown = await response.json().catch(() => null);
    return this.extractVector(data);
  }

  private extractVector(data: unknown): number[] {
    const entries = typeof data === 'object' && data !== null && 'data' in data ? data.data : undefined;
    const first: unknown = Array.isArray(entries) ? entries[0] : undefined;
    const values: unknown =
      typeof first === 'object' && first !== null && 'values' in first ? first.values : undefined;

    if (!Array.isArray(values) || values.length === 0) {
      throw new EmbeddingError('Embedding response contained no vector');
    }

    const vector: number[] = [];
    for (const value of values) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new EmbeddingError('Embedding response contained a non-numeric component');
      }
      vector.push(value);
    }

    if (this.options.dimension !== undefined && vector.length !== this.options.dimension) {
      throw new EmbeddingError(
        `Embedding dimension mismatch: expected ${this.options.dimension}, got ${vector.length}`
      );
    }

    return vector;
  }
}
