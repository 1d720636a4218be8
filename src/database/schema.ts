/**
 * Database Schema Types
 *
 * Application-side shapes of the `collections` and `chunks` tables, and the
 * embedding BLOB codec.
 */

/**
 * A named document set. All of its chunks share one embedding model.
 */
export interface CollectionInfo {
  name: string;
  embeddingModel: string;
  dimensions: number;
  createdAt: string;
  /** ISO timestamp of the last completed ingest, if any */
  indexedAt: string | null;
}

/**
 * Convert a Float32Array to a Buffer for BLOB storage.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob(new Float32Array([0.1, 0.2, 0.3]));
 * db.prepare('UPDATE chunks SET embedding = ? WHERE id = ?').run(blob, id);
 * ```
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert a BLOB back to a Float32Array.
 *
 * The bytes are copied: a Buffer from SQLite may sit at an offset that is
 * not 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const bytes = new Uint8Array(blob);
  return new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4));
}
