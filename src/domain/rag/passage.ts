/**
 * Retrieval Domain Types
 */

export type MetadataValue = string | number | boolean;

export interface PassageSource {
  title?: string;
  uri?: string;
  page?: number;
  [key: string]: MetadataValue | undefined;
}

export interface PassageChunk {
  readonly id: string;
  readonly text: string;
  readonly source: Readonly<PassageSource>;
  readonly score: number;
}

/**
 * Ranked passages for one query.
 * Ids are unique and scores never increase along the list.
 */
export interface RetrievalResult {
  readonly query: string;
  readonly passages: readonly PassageChunk[];
}

export interface RetrieveOptions {
  k: number;
  minScore: number;
  signal?: AbortSignal;
}

export function emptyRetrievalResult(query: string): RetrievalResult {
  return { query, passages: [] };
}

export function describeSource(source: Readonly<PassageSource>): string {
  const title = source.title || source.uri || 'knowledge base';
  return typeof source.page === 'number' ? `${title}, p. ${source.page}` : title;
}
