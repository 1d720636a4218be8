/**
 * Database Operations
 *
 * Typed access to collections and chunks. Handles:
 * - Float32Array ↔ Buffer conversion
 * - JSON metadata serialization
 * - Transactions for batch writes
 */

import type Database from 'better-sqlite3';

import { DatabaseError } from '../errors/index.js';
import type { EmbeddedChunk } from '../indexer/embedder/types.js';
import { embeddingToBlob, type CollectionInfo } from './schema.js';
import {
  ChunkRowSchema,
  CollectionRowSchema,
  CountRowSchema,
  validateRow,
  type ChunkRow,
  type CollectionRow,
} from './validation.js';

function toCollectionInfo(row: CollectionRow): CollectionInfo {
  return {
    name: row.name,
    embeddingModel: row.embedding_model,
    dimensions: row.dimensions,
    createdAt: row.created_at,
    indexedAt: row.indexed_at,
  };
}

/**
 * High-level database operations over one connection.
 */
export class DatabaseOperations {
  constructor(private readonly db: Database.Database) {}

  // --------------------------------------------------------------------------
  // Collections
  // --------------------------------------------------------------------------

  getCollection(name: string): CollectionInfo | undefined {
    const row = this.db.prepare('SELECT * FROM collections WHERE name = ?').get(name);
    return row
      ? toCollectionInfo(validateRow(CollectionRowSchema, row, `collections.name=${name}`))
      : undefined;
  }

  /**
   * Create the collection, or confirm an existing one uses the same model.
   *
   * @throws DatabaseError if the collection was built with another model or
   *   dimension count; its vectors would not be comparable
   */
  ensureCollection(name: string, embeddingModel: string, dimensions: number): CollectionInfo {
    const existing = this.getCollection(name);

    if (existing) {
      if (existing.embeddingModel !== embeddingModel || existing.dimensions !== dimensions) {
        throw new DatabaseError(
          `Collection "${name}" was indexed with ${existing.embeddingModel} ` +
            `(${existing.dimensions} dims), but ${embeddingModel} (${dimensions} dims) is configured. ` +
            `Run: docent reset  and ingest again`
        );
      }
      return existing;
    }

    this.db
      .prepare('INSERT INTO collections (name, embedding_model, dimensions) VALUES (?, ?, ?)')
      .run(name, embeddingModel, dimensions);

    const created = this.getCollection(name);
    if (!created) {
      throw new DatabaseError(`Failed to create collection "${name}"`);
    }
    return created;
  }

  /** Record a completed ingest */
  touchCollection(name: string, at: Date = new Date()): void {
    this.db
      .prepare('UPDATE collections SET indexed_at = ? WHERE name = ?')
      .run(at.toISOString(), name);
  }

  /**
   * Delete a collection and (by cascade) all of its chunks.
   *
   * @returns number of chunks removed
   */
  deleteCollection(name: string): number {
    return this.db.transaction(() => {
      const removed = this.countChunks(name);
      this.db.prepare('DELETE FROM collections WHERE name = ?').run(name);
      return removed;
    })();
  }

  // --------------------------------------------------------------------------
  // Chunks
  // --------------------------------------------------------------------------

  /**
   * Insert chunks, replacing any with the same id.
   */
  upsertChunks(collection: string, chunks: readonly EmbeddedChunk[]): void {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO chunks
        (id, collection, content, embedding, source_path, source_title, source_type,
         chunk_index, total_chunks, metadata)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      for (const chunk of chunks) {
        insert.run(
          chunk.id,
          collection,
          chunk.content,
          embeddingToBlob(chunk.embedding),
          chunk.sourcePath,
          chunk.sourceTitle,
          chunk.sourceType,
          chunk.chunkIndex,
          chunk.totalChunks,
          JSON.stringify(chunk.metadata)
        );
      }
    })();
  }

  /**
   * Remove every chunk of one source document.
   *
   * @returns number of chunks removed
   */
  deleteBySource(collection: string, sourcePath: string): number {
    return this.db
      .prepare('DELETE FROM chunks WHERE collection = ? AND source_path = ?')
      .run(collection, sourcePath).changes;
  }

  /**
   * Atomically swap a source's chunks for a fresh set.
   */
  replaceSource(collection: string, sourcePath: string, chunks: readonly EmbeddedChunk[]): void {
    this.db.transaction(() => {
      this.deleteBySource(collection, sourcePath);
      this.upsertChunks(collection, chunks);
    })();
  }

  countChunks(collection: string): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM chunks WHERE collection = ?')
      .get(collection);
    return validateRow(CountRowSchema, row, `chunks.collection=${collection}`).count;
  }

  countSources(collection: string): number {
    const row = this.db
      .prepare('SELECT COUNT(DISTINCT source_path) AS count FROM chunks WHERE collection = ?')
      .get(collection);
    return validateRow(CountRowSchema, row, `chunks.collection=${collection}`).count;
  }

  /**
   * Stream every chunk row of a collection without loading them all at once.
   */
  *iterateChunks(collection: string): Generator<ChunkRow> {
    const stmt = this.db.prepare(`
      SELECT id, content, embedding, source_path, source_title, source_type,
             chunk_index, total_chunks, metadata
      FROM chunks
      WHERE collection = ?
      ORDER BY id
    `);

    for (const row of stmt.iterate(collection)) {
      yield validateRow(ChunkRowSchema, row, `chunks.collection=${collection}`);
    }
  }
}
