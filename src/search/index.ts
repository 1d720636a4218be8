/**
 * Search Module
 *
 * Dense retrieval over the SQLite vector store.
 *
 * @example
 * ```typescript
 * import { VectorStore, VectorRetriever } from './search/index.js';
 *
 * const store = new VectorStore(new DatabaseOperations(getDb()), 'docs');
 * const retriever = new VectorRetriever(embeddingProvider, store);
 * const chunks = await retriever.search('deploy steps', 6);
 * ```
 */

export { VectorStore, cosineSimilarity, toScore } from './store.js';
export { VectorRetriever, type VectorRetrieverOptions } from './retriever.js';
export type { Retriever, VectorSearchOptions } from './types.js';
