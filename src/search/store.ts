/**
 * Vector Store
 *
 * Brute-force cosine similarity over one collection's chunks in SQLite.
 * Rows are streamed and scored one at a time; only the running top-K is
 * kept in memory.
 */

import { z } from 'zod';

import { blobToEmbedding } from '../database/schema.js';
import type { DatabaseOperations } from '../database/operations.js';
import type { ChunkRow } from '../database/validation.js';
import type { DocumentChunk, MetadataValue } from '../indexer/chunker/types.js';
import type { EmbeddedChunk } from '../indexer/embedder/types.js';
import type { HealthStatus } from '../providers/types.js';
import { consoleLogger, safeJsonParse, type Logger } from '../utils/index.js';
import type { VectorSearchOptions } from './types.js';

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

/**
 * Cosine similarity of two vectors. Returns 0 for mismatched lengths or a
 * zero vector.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Clamp a cosine similarity into [0, 1] */
export function toScore(similarity: number): number {
  return Math.min(1, Math.max(0, similarity));
}

export class VectorStore {
  constructor(
    private readonly ops: DatabaseOperations,
    readonly collection: string,
    private readonly logger: Logger = consoleLogger
  ) {}

  upsert(chunks: readonly EmbeddedChunk[]): void {
    this.ops.upsertChunks(this.collection, chunks);
  }

  deleteBySource(sourcePath: string): number {
    return this.ops.deleteBySource(this.collection, sourcePath);
  }

  count(): number {
    return this.ops.countChunks(this.collection);
  }

  /** Drop the collection and all its chunks */
  reset(): number {
    return this.ops.deleteCollection(this.collection);
  }

  /**
   * Top-K chunks by cosine similarity to `vector`, best first.
   * Ties are broken by chunk id so results are stable.
   */
  search(vector: Float32Array, options: VectorSearchOptions): DocumentChunk[] {
    const { topK, minScore = 0 } = options;
    if (topK <= 0) {
      return [];
    }

    const best: Array<{ row: ChunkRow; score: number }> = [];

    for (const row of this.ops.iterateChunks(this.collection)) {
      const score = toScore(cosineSimilarity(vector, blobToEmbedding(row.embedding)));
      if (score < minScore) {
        continue;
      }
      best.push({ row, score });
      if (best.length > topK) {
        best.sort(compareHits);
        best.pop();
      }
    }

    return best.sort(compareHits).map(({ row, score }) => this.toChunk(row, score));
  }

  healthCheck(): HealthStatus {
    const start = performance.now();
    try {
      const chunks = this.count();
      return {
        name: 'vector store',
        healthy: true,
        message: `${chunks} chunks in "${this.collection}"`,
        latencyMs: Math.round(performance.now() - start),
      };
    } catch (error) {
      return {
        name: 'vector store',
        healthy: false,
        message: error instanceof Error ? error.message : String(error),
        latencyMs: Math.round(performance.now() - start),
      };
    }
  }

  private toChunk(row: ChunkRow, score: number): DocumentChunk {
    const metadata: Record<string, MetadataValue> = safeJsonParse(
      row.metadata,
      MetadataSchema,
      {},
      (err) => {
        this.logger.warn(`Skipping corrupted metadata for chunk ${row.id}: ${err.message}`);
      }
    );

    return {
      id: row.id,
      content: row.content,
      metadata,
      sourcePath: row.source_path,
      sourceTitle: row.source_title,
      sourceType: row.source_type,
      chunkIndex: row.chunk_index,
      totalChunks: row.total_chunks,
      score,
    };
  }
}

function compareHits(
  a: { row: ChunkRow; score: number },
  b: { row: ChunkRow; score: number }
): number {
  return b.score - a.score || (a.row.id < b.row.id ? -1 : a.row.id > b.row.id ? 1 : 0);
}
