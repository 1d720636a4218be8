/**
 * Ingest Command
 *
 * Adds a directory of documents to the configured collection.
 *
 * Usage:
 *   docent ingest ./docs
 *   docent ingest ./docs --chunk-size 500 --overlap 50
 *   docent ingest ./docs --json       Output progress as NDJSON
 *   docent ingest ./docs --verbose    Show every warning and skipped file
 *
 * Re-ingesting a file replaces its previous chunks.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { existsSync, statSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { abortOnInterrupt, loadCommandConfig } from '../utils/runtime.js';
import { IngestOptionsSchema, validateInput, type IngestOptionsInput } from '../validation.js';
import { openConfiguredDb } from '../../agent/factory.js';
import { closeDb, DatabaseOperations } from '../../database/index.js';
import { CLIError, FileNotFoundError } from '../../errors/index.js';
import { resolveChunkConfig } from '../../indexer/chunker/config.js';
import { createEmbeddingProvider } from '../../indexer/embedder/provider.js';
import { runIngest } from '../../indexer/pipeline.js';

const BYTES_PER_MB = 1024 * 1024;

export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<dir>', 'Directory of documents to ingest')
    .description('Chunk, embed and store the documents in a directory')
    .option('-c, --chunk-size <tokens>', 'Chunk size in approximate tokens')
    .option('-o, --overlap <tokens>', 'Tokens shared between consecutive chunks')
    .action(async (dir: string, cmdOptions: IngestOptionsInput) => {
      const ctx = getContext();

      const rootPath = resolve(dir);
      if (!existsSync(rootPath)) {
        throw new FileNotFoundError(rootPath);
      }
      if (!statSync(rootPath).isDirectory()) {
        throw new CLIError(
          `Path is not a directory: ${rootPath}`,
          'docent ingest requires a directory path, not a file'
        );
      }

      const { chunkSize, overlap } = validateInput(IngestOptionsSchema, cmdOptions);
      const config = loadCommandConfig(ctx.options);
      const chunkConfig = resolveChunkConfig(
        { chunkTokens: config.indexing.chunk_tokens, overlapTokens: config.indexing.chunk_overlap },
        { chunkTokens: chunkSize, overlapTokens: overlap }
      );

      ctx.debug(`Ingesting: ${rootPath}`);
      ctx.debug(`Chunking: ${chunkConfig.chunkTokens} tokens, ${chunkConfig.overlapTokens} overlap`);
      ctx.debug(`Embedding: ${config.embedding.model} (${config.embedding.provider})`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });
      const interrupt = abortOnInterrupt();

      try {
        const result = await runIngest({
          rootPath,
          collection: config.storage.collection,
          ops: new DatabaseOperations(openConfiguredDb(config)),
          provider: createEmbeddingProvider(config),
          chunkConfig,
          extensions: config.indexing.extensions,
          ignorePatterns: config.indexing.ignore_patterns,
          maxFileSize: Math.round(config.indexing.max_file_size_mb * BYTES_PER_MB),
          batchSize: config.embedding.batch_size,
          signal: interrupt.signal,
          onStageStart: (stage, total) => reporter.startStage(stage, total),
          onProgress: (processed, _total, file) => reporter.updateProgress(processed, file),
          onWarning: (message, file) => reporter.warn(message, file),
        });

        reporter.showSummary(result);

        if (result.filesProcessed === 0 && result.filesScanned > 0) {
          ctx.warn('No documents were ingested; run with --verbose to see why');
        }
      } catch (error) {
        reporter.fail('Ingest failed');
        throw error;
      } finally {
        interrupt.dispose();
        closeDb();
      }
    });
}
