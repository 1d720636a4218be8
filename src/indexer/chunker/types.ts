/**
 * Chunker Types
 *
 * DocumentChunk is the unit of retrieval and citation. The chunker creates
 * them without a score; the vector store returns them with one.
 */

import type { DocumentType } from '../types.js';

/** Scalar values allowed in chunk metadata */
export type MetadataValue = string | number | boolean;

/**
 * Chunk metadata. Key order is stable: path, title, type, size, modified,
 * chunk_id, total_chunks, then anything added by the caller.
 */
export type ChunkMetadata = Readonly<Record<string, MetadataValue>>;

/**
 * A bounded text segment of a source document.
 *
 * Invariant: 0 <= chunkIndex < totalChunks, and totalChunks is the number of
 * chunks produced from the same source in the same pass.
 */
export interface DocumentChunk {
  /** md5(sourcePath) + "-" + chunkIndex */
  readonly id: string;
  readonly content: string;
  readonly metadata: ChunkMetadata;
  readonly sourcePath: string;
  /** Display title; empty when none is known */
  readonly sourceTitle: string;
  readonly sourceType: DocumentType;
  readonly chunkIndex: number;
  readonly totalChunks: number;
  /** Relevance in [0, 1], set only on retrieval results */
  readonly score?: number;
}

/**
 * Plain text pulled from a source file, ready for chunking.
 */
export interface ExtractedDocument {
  path: string;
  title: string;
  type: DocumentType;
  text: string;
  /** Size of the source file in bytes */
  size: number;
  /** ISO 8601 modification time of the source file */
  modifiedAt: string;
}
