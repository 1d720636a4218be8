/**
 * Database Module
 *
 * SQLite storage for collections and document chunks.
 *
 * @example
 * ```ts
 * import { getDb, DatabaseOperations } from './database/index.js';
 *
 * const ops = new DatabaseOperations(getDb());
 * ops.ensureCollection('docs', 'nomic-embed-text', 768);
 * ```
 */

// Connection management
export { openDatabase, getDb, closeDb } from './connection.js';

// Migrations
export {
  runMigrations,
  getAppliedMigrations,
  MIGRATIONS,
  type MigrationResult,
} from './migrate.js';

// Schema types and BLOB codec
export { embeddingToBlob, blobToEmbedding, type CollectionInfo } from './schema.js';

// Row validation
export {
  CollectionRowSchema,
  ChunkRowSchema,
  CountRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
  type CollectionRow,
  type ChunkRow,
} from './validation.js';

// High-level operations
export { DatabaseOperations } from './operations.js';
