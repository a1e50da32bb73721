export type { VectorIndexClient, VectorMatch, VectorMetadata, VectorRecord } from './types.js';
export { VectorIndexError } from './types.js';
export type { HttpVectorIndexOptions } from './http-vector-index.js';
export { HttpVectorIndexClient } from './http-vector-index.js';
export { InMemoryVectorIndex, cosineSimilarity } from './in-memory-vector-index.js';
