/**
 * Docent - Library Entry Point
 *
 * The CLI (`docent ask`, `docent ingest`, ...) covers most uses. This module
 * exposes the same pieces for embedding the pipeline in another program.
 *
 * @example Answer a question against an ingested collection
 * ```typescript
 * import { loadConfig, createPipeline } from 'docent';
 *
 * const config = loadConfig();
 * const { orchestrator } = createPipeline(config);
 * const result = await orchestrator.ask('How do I deploy?');
 * console.log(result.answerText);
 * ```
 *
 * @packageDocumentation
 */

export * from './agent/index.js';
export * from './config/index.js';
export * from './database/index.js';
export * from './errors/index.js';
export * from './eval/index.js';
export * from './indexer/index.js';
export * from './prompt/index.js';
export * from './providers/index.js';
export * from './safety/index.js';
export * from './search/index.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { createConsoleLogger, silentLogger } from './utils/logger.js';
