/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, embedChunks } from './embedder/index.js';
 *
 * const provider = createEmbeddingProvider(config);
 * const embedded = await embedChunks(chunks, provider, {
 *   onProgress: (done, total) => console.log(`${done}/${total}`),
 * });
 * ```
 */

export {
  createEmbeddingProvider,
  embeddingSpecFromConfig,
  OpenAIEmbeddingProvider,
  EMBEDDINGS_NAME,
} from './provider.js';

export { embedChunks, embedQuery, DEFAULT_BATCH_SIZE } from './embedder.js';

export type {
  EmbeddedChunk,
  EmbedderOptions,
  EmbeddingProvider,
  EmbeddingProviderSpec,
} from './types.js';
