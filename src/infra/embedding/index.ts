export type { Embedder, HttpEmbedderOptions } from './embedder.js';
export { HttpEmbedder, EmbeddingError, MAX_EMBEDDING_INPUT_CHARS } from './embedder.js';
