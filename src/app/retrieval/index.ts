export type { IRetriever, RetrieverOptions } from './retriever.js';
export { Retriever, compareByScore } from './retriever.js';
export { buildEmbeddingText, hasAnaphoricReference } from './history-condenser.js';
