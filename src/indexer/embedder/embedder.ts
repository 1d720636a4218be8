/**
 * Embedder Orchestration
 *
 * Turns DocumentChunk[] into EmbeddedChunk[]:
 * 1. Batch chunks (default: 32 per request)
 * 2. On a failed batch, retry its chunks one by one so a single bad chunk
 *    is skipped instead of the whole batch
 * 3. Report progress after each batch
 *
 * Cancellation and an unreachable provider stop the run; nothing is
 * retried against a backend that is down.
 */

import { BackendError, isCancellationError } from '../../errors/index.js';
import type { DocumentChunk } from '../chunker/types.js';
import type { EmbeddedChunk, EmbedderOptions, EmbeddingProvider } from './types.js';

/** Default batch size */
export const DEFAULT_BATCH_SIZE = 32;

function isFatal(error: unknown): boolean {
  return (
    isCancellationError(error) || (error instanceof BackendError && error.kind === 'unavailable')
  );
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Compute embeddings for chunks, in order. Chunks whose embedding fails on
 * its own are reported through `onError` and left out.
 *
 * @example
 * ```typescript
 * const embedded = await embedChunks(chunks, provider, {
 *   batchSize: config.embedding.batch_size,
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * ```
 *
 * @throws BackendError when cancelled or when the provider is unavailable
 */
export async function embedChunks(
  chunks: readonly DocumentChunk[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<EmbeddedChunk[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, signal, onProgress, onError } = options;

  const embedded: EmbeddedChunk[] = [];
  let processed = 0;

  for (let i = 0; i < chunks.length; i += batchSize) {
    if (signal?.aborted) {
      throw BackendError.cancelled(provider.name);
    }

    const batch = chunks.slice(i, i + batchSize);

    try {
      const vectors = await provider.embed(
        batch.map((chunk) => chunk.content),
        signal
      );
      batch.forEach((chunk, j) => {
        const embedding = vectors[j];
        if (embedding === undefined || embedding.length === 0) {
          onError?.(new Error('Empty embedding returned for chunk'), chunk.id);
          return;
        }
        embedded.push({ ...chunk, embedding });
      });
      processed += batch.length;
      onProgress?.(processed, chunks.length);
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }

      for (const chunk of batch) {
        try {
          const [embedding] = await provider.embed([chunk.content], signal);
          if (embedding !== undefined && embedding.length > 0) {
            embedded.push({ ...chunk, embedding });
          } else {
            onError?.(new Error('Empty embedding returned for chunk'), chunk.id);
          }
        } catch (chunkError) {
          if (isFatal(chunkError)) {
            throw chunkError;
          }
          onError?.(asError(chunkError), chunk.id);
        }
        processed++;
        onProgress?.(processed, chunks.length);
      }
    }
  }

  return embedded;
}

/**
 * Embed a single query string.
 */
export async function embedQuery(
  provider: EmbeddingProvider,
  query: string,
  signal?: AbortSignal
): Promise<Float32Array> {
  const [vector] = await provider.embed([query], signal);
  if (vector === undefined) {
    throw BackendError.request(provider.name, 'no embedding returned for query');
  }
  return vector;
}
