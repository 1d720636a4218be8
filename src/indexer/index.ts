/**
 * Indexer Module
 *
 * Turns a directory of documents into embedded chunks in the vector store.
 *
 * @example
 * ```ts
 * import { runIngest } from './indexer/index.js';
 *
 * const result = await runIngest({
 *   rootPath: './docs',
 *   collection: 'docs',
 *   ops,
 *   provider,
 *   chunkConfig: { chunkTokens: 1000, overlapTokens: 200 },
 * });
 *
 * console.log(`Stored ${result.chunksStored} chunks from ${result.filesProcessed} files`);
 * ```
 */

// File discovery
export { scanDirectory, buildGlobPattern } from './scanner.js';
export {
  createIgnoreFilter,
  parseGitignoreContent,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';

// Types and constants
export {
  type DocumentType,
  type FileInfo,
  type ScanOptions,
  type ScanStats,
  type ScanResult,
  type SkippedFile,
  EXTENSION_TYPES,
  DEFAULT_IGNORE_PATTERNS,
  getDocumentType,
} from './types.js';

// Extraction and chunking
export * from './chunker/index.js';

// Embedding
export * from './embedder/index.js';

// Ingest orchestration
export {
  runIngest,
  type IngestOptions,
  type IngestResult,
  type IngestStage,
} from './pipeline.js';
