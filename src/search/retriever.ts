/**
 * Vector Retriever
 *
 * Embeds the query with the configured embedding provider and searches the
 * vector store. Any failure surfaces as a RetrievalError, except
 * cancellation, which passes through unchanged.
 */

import { RetrievalError, isCancellationError } from '../errors/index.js';
import type { DocumentChunk } from '../indexer/chunker/types.js';
import { embedQuery } from '../indexer/embedder/embedder.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type { HealthStatus } from '../providers/types.js';
import type { VectorStore } from './store.js';
import type { Retriever } from './types.js';

export interface VectorRetrieverOptions {
  /** @default 0 */
  minScore?: number;
}

/**
 * @example
 * ```typescript
 * const retriever = new VectorRetriever(provider, store, { minScore: 0.2 });
 * const chunks = await retriever.search('How do I rotate keys?', 6, signal);
 * ```
 */
export class VectorRetriever implements Retriever {
  private readonly minScore: number;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly store: VectorStore,
    options: VectorRetrieverOptions = {}
  ) {
    this.minScore = options.minScore ?? 0;
  }

  async search(query: string, topK: number, signal?: AbortSignal): Promise<DocumentChunk[]> {
    try {
      const vector = await embedQuery(this.provider, query, signal);
      return this.store.search(vector, { topK, minScore: this.minScore });
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new RetrievalError(`Search failed: ${cause.message}`, cause);
    }
  }

  /**
   * Healthy when both the store and the embedding provider are.
   */
  async healthCheck(signal?: AbortSignal): Promise<HealthStatus> {
    const storeStatus = this.store.healthCheck();
    if (!storeStatus.healthy) {
      return storeStatus;
    }

    const providerStatus = await this.provider.healthCheck(signal);
    return {
      name: 'retriever',
      healthy: providerStatus.healthy,
      message: providerStatus.healthy
        ? storeStatus.message
        : `embeddings: ${providerStatus.message}`,
      latencyMs: storeStatus.latencyMs + providerStatus.latencyMs,
    };
  }
}
