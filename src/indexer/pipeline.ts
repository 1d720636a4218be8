/**
 * Ingest Pipeline
 *
 * Orchestrates the ingest workflow for one directory:
 * Scan → (per file) Extract → Chunk → Embed → Store
 *
 * Each file's chunks replace whatever that file had stored before, in one
 * transaction, so re-ingesting a directory is idempotent. Files that cannot
 * be extracted are skipped and reported; cancellation and an unreachable
 * embedding provider stop the run.
 *
 * The pipeline doesn't know how to display progress; it fires callbacks.
 */

import { BackendError, ValidationError } from '../errors/index.js';
import type { DatabaseOperations } from '../database/operations.js';
import { scanDirectory } from './scanner.js';
import { chunkDocument } from './chunker/chunker.js';
import type { ChunkConfig } from './chunker/config.js';
import type { DocumentChunk } from './chunker/types.js';
import { extractDocument } from './chunker/extractors/index.js';
import { embedChunks } from './embedder/embedder.js';
import type { EmbeddingProvider } from './embedder/types.js';
import type { FileInfo, SkippedFile } from './types.js';

export type IngestStage = 'scanning' | 'processing';

export interface IngestOptions {
  /** Directory to ingest */
  rootPath: string;

  /** Collection the chunks are stored in */
  collection: string;

  ops: DatabaseOperations;

  provider: EmbeddingProvider;

  chunkConfig: ChunkConfig;

  /** @default every supported extension */
  extensions?: string[];

  /** Extra gitignore-style patterns to skip */
  ignorePatterns?: string[];

  /** Files larger than this many bytes are skipped */
  maxFileSize?: number;

  /** @default 32 */
  batchSize?: number;

  signal?: AbortSignal;

  // Progress callbacks
  onStageStart?: (stage: IngestStage, total: number) => void;
  onProgress?: (processed: number, total: number, currentFile: string) => void;
  onWarning?: (message: string, context?: string) => void;
}

export interface IngestResult {
  filesScanned: number;
  /** Files whose chunks were stored */
  filesProcessed: number;
  /** Files left out by the scan or by extraction, with the reason */
  skipped: SkippedFile[];
  chunksCreated: number;
  chunksStored: number;
  /** Chunks that could not be embedded, as "chunkId: message" */
  errors: string[];
  durationMs: number;
}

/**
 * Ingest every supported document under `rootPath`.
 *
 * @example
 * ```typescript
 * const result = await runIngest({
 *   rootPath: './docs',
 *   collection: config.storage.collection,
 *   ops: new DatabaseOperations(getDb()),
 *   provider: createEmbeddingProvider(config),
 *   chunkConfig: { chunkTokens: 1000, overlapTokens: 200 },
 *   onProgress: (done, total, file) => (spinner.text = `${done}/${total} ${file}`),
 * });
 * ```
 *
 * @throws ValidationError if the overlap is not below the chunk size
 * @throws DatabaseError if the collection was built with another embedding model
 * @throws BackendError when cancelled or when the embedding provider is unavailable
 */
export async function runIngest(options: IngestOptions): Promise<IngestResult> {
  const { collection, ops, provider, chunkConfig, signal, onStageStart, onProgress, onWarning } =
    options;
  const startTime = performance.now();

  if (chunkConfig.overlapTokens >= chunkConfig.chunkTokens) {
    throw new ValidationError('Invalid chunking parameters', [
      `overlap (${chunkConfig.overlapTokens}) must be less than chunk size (${chunkConfig.chunkTokens})`,
    ]);
  }

  ops.ensureCollection(collection, provider.model, provider.dimensions);

  // =========================================================================
  // STAGE 1: SCANNING
  // =========================================================================
  onStageStart?.('scanning', 0);
  const scan = await scanDirectory(options.rootPath, {
    extensions: options.extensions,
    additionalIgnorePatterns: options.ignorePatterns,
    maxFileSize: options.maxFileSize,
    onError: (path, error) => onWarning?.(`Cannot read file: ${error.message}`, path),
  });

  const skipped: SkippedFile[] = [...scan.skipped];
  const errors: string[] = [];
  let filesProcessed = 0;
  let chunksCreated = 0;
  let chunksStored = 0;

  // =========================================================================
  // STAGE 2: PROCESSING
  // =========================================================================
  onStageStart?.('processing', scan.files.length);

  for (const [index, file] of scan.files.entries()) {
    if (signal?.aborted) {
      throw BackendError.cancelled(provider.name);
    }
    onProgress?.(index, scan.files.length, file.relativePath);

    const stored = await ingestFile(file, options, {
      onSkip: (reason) => {
        skipped.push({ path: file.path, reason });
        onWarning?.(reason, file.relativePath);
      },
      onChunkError: (message) => {
        errors.push(message);
        onWarning?.(message, file.relativePath);
      },
    });

    if (stored !== undefined) {
      filesProcessed++;
      chunksCreated += stored.created;
      chunksStored += stored.stored;
    }
  }

  onProgress?.(scan.files.length, scan.files.length, '');
  ops.touchCollection(collection);

  return {
    filesScanned: scan.files.length + scan.skipped.length,
    filesProcessed,
    skipped,
    chunksCreated,
    chunksStored,
    errors,
    durationMs: Math.round(performance.now() - startTime),
  };
}

interface FileCallbacks {
  onSkip: (reason: string) => void;
  onChunkError: (message: string) => void;
}

/**
 * Extract, chunk, embed and store one file.
 *
 * @returns chunk counts, or undefined when the file was skipped
 */
async function ingestFile(
  file: FileInfo,
  options: IngestOptions,
  callbacks: FileCallbacks
): Promise<{ created: number; stored: number } | undefined> {
  let chunks: DocumentChunk[];
  try {
    const doc = await extractDocument(file);
    chunks = chunkDocument(doc, options.chunkConfig);
  } catch (error) {
    callbacks.onSkip(error instanceof Error ? error.message : String(error));
    return undefined;
  }

  const embedded = await embedChunks(chunks, options.provider, {
    batchSize: options.batchSize,
    signal: options.signal,
    onError: (error, chunkId) => callbacks.onChunkError(`${chunkId}: ${error.message}`),
  });

  if (embedded.length === 0) {
    callbacks.onSkip('no chunk could be embedded');
    return undefined;
  }

  options.ops.replaceSource(options.collection, file.path, embedded);
  return { created: chunks.length, stored: embedded.length };
}
