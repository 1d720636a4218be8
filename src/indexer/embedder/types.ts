/**
 * Embedder Types
 *
 * Embeddings are stored as Float32Array: 4 bytes per dimension, written
 * straight into a SQLite BLOB.
 */

import type { HealthStatus } from '../../providers/types.js';
import type { DocumentChunk } from '../chunker/types.js';

/**
 * Embedding endpoint settings. Ollama serves the OpenAI embeddings API under
 * `/v1`; an OpenAI-compatible base URL is used as configured.
 */
export type EmbeddingProviderSpec =
  | {
      kind: 'ollama';
      baseUrl: string;
      model: string;
      dimensions: number;
      timeoutMs: number;
    }
  | {
      kind: 'openai-compatible';
      baseUrl: string;
      model: string;
      dimensions: number;
      timeoutMs: number;
      apiKey: string;
    };

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  /** Length of every vector this provider returns */
  readonly dimensions: number;

  /**
   * Embed texts in one request, preserving order.
   * @throws BackendError
   */
  embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;

  healthCheck(signal?: AbortSignal): Promise<HealthStatus>;
}

/**
 * A chunk with its computed embedding, ready for storage.
 */
export interface EmbeddedChunk extends DocumentChunk {
  readonly embedding: Float32Array;
}

/**
 * Options for embedChunks.
 */
export interface EmbedderOptions {
  /**
   * Number of chunks per request.
   * @default 32
   */
  batchSize?: number;

  signal?: AbortSignal;

  /**
   * Fired after each batch.
   * @param processed - Number of chunks handled so far
   * @param total - Total number of chunks
   */
  onProgress?: (processed: number, total: number) => void;

  /**
   * Non-fatal error: the chunk is skipped and processing continues.
   */
  onError?: (error: Error, chunkId: string) => void;
}
