/**
 * Retriever
 *
 * Embeds a query, searches the vector index and returns a ranked,
 * deduplicated passage set above the relevance threshold.
 */

import type { Embedder } from '../../infra/embedding/index.js';
import type { VectorIndexClient, VectorMatch } from '../../infra/vector-index/index.js';
import type { ConversationTurn } from '../../domain/conversation/turn.js';
import type { PassageChunk, PassageSource, RetrievalResult, RetrieveOptions } from '../../domain/rag/passage.js';
import { emptyRetrievalResult } from '../../domain/rag/passage.js';
import { CancelledError, RetrievalError, throwIfAborted } from '../../domain/generation/errors.js';
import { buildEmbeddingText } from './history-condenser.js';

export interface RetrieverOptions {
  /** Matches requested per wanted passage, to leave room for filtering */
  oversampleFactor?: number;
  /** Recent user turns fused into follow-up queries */
  historyFusionTurns?: number;
  logger?: Pick<Console, 'debug' | 'warn'>;
  debug?: boolean;
}

export interface IRetriever {
  retrieve(
    query: string,
    history: readonly ConversationTurn[],
    options: RetrieveOptions
  ): Promise<RetrievalResult>;
}

export function compareByScore(a: PassageChunk, b: PassageChunk): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class Retriever implements IRetriever {
  private readonly oversampleFactor: number;
  private readonly historyFusionTurns: number;
  private readonly logger: Pick<Console, 'debug' | 'warn'>;

  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndexClient,
    private readonly options: RetrieverOptions = {}
  ) {
    this.oversampleFactor = Math.max(1, options.oversampleFactor ?? 2);
    this.historyFusionTurns = options.historyFusionTurns ?? 2;
    this.logger = options.logger ?? console;
  }

  async retrieve(
    query: string,
    history: readonly ConversationTurn[],
    options: RetrieveOptions
  ): Promise<RetrievalResult> {
    const { k, minScore, signal } = options;
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }
    if (!Number.isFinite(minScore)) {
      throw new RangeError(`minScore must be a finite number, got ${minScore}`);
    }
    throwIfAborted(signal);

    const text = buildEmbeddingText(query, history, this.historyFusionTurns);
    if (!text) {
      return emptyRetrievalResult(query);
    }

    let matches: VectorMatch[];
    try {
      const vector = await this.embedder.embed(text, signal);
      throwIfAborted(signal);
      const topN = Math.max(k, Math.ceil(k * this.oversampleFactor));
      matches = await this.index.search(vector, topN, signal);
    } catch (error) {
      if (error instanceof CancelledError || signal?.aborted) {
        throw new CancelledError();
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RetrievalError(`Knowledge base retrieval failed: ${message}`, { cause: error });
    }
    throwIfAborted(signal);

    const best = new Map<string, PassageChunk>();
    for (const match of matches) {
      if (!(match.score >= minScore)) {
        continue;
      }
      const passage = this.toPassage(match);
      if (!passage) {
        continue;
      }
      const existing = best.get(passage.id);
      if (!existing || passage.score > existing.score) {
        best.set(passage.id, passage);
      }
    }

    const passages = [...best.values()].sort(compareByScore).slice(0, k);

    if (this.options.debug) {
      this.logger.debug(
        `[Retriever] ${matches.length} matches -> ${passages.length} passages (k=${k}, minScore=${minScore})`
      );
    }

    return { query, passages };
  }

  private toPassage(match: VectorMatch): PassageChunk | null {
    const text = match.metadata.text;
    if (typeof text !== 'string' || !text.trim()) {
      this.logger.warn(`[Retriever] Match ${match.id} has no text metadata, skipping`);
      return null;
    }

    const source: PassageSource = {};
    for (const [key, value] of Object.entries(match.metadata)) {
      if (key === 'text') continue;
      if (key === 'title' || key === 'uri') {
        if (typeof value === 'string') source[key] = value;
      } else if (key === 'page') {
        if (typeof value === 'number') source.page = value;
      } else {
        source[key] = value;
      }
    }
    // Ingested documents record their file path under `source`
    if (source.uri === undefined && typeof match.metadata.source === 'string') {
      source.uri = match.metadata.source;
    }

    return Object.freeze({
      id: match.id,
      text: text.trim(),
      source: Object.freeze(source),
      score: match.score,
    });
  }
}
