/**
 * Pipeline Factory
 *
 * Wires the configured backends, the SQLite vector store and the safety
 * guard into an Orchestrator, and aggregates their health checks.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const pipeline = createPipeline(config, { logger });
 * const result = await pipeline.orchestrator.ask('How do I deploy?');
 * ```
 */

import type Database from 'better-sqlite3';

import type { Config } from '../config/index.js';
import { expandHome } from '../config/index.js';
import { getDb } from '../database/connection.js';
import { DatabaseOperations } from '../database/operations.js';
import { createEmbeddingProvider } from '../indexer/embedder/provider.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { PromptBuilder } from '../prompt/builder.js';
import { createGenerator, createGuardGenerator } from '../providers/llm.js';
import type { Generator, HealthStatus } from '../providers/types.js';
import { SafetyGuard } from '../safety/guard.js';
import type { SafetyClassifier } from '../safety/types.js';
import { VectorRetriever } from '../search/retriever.js';
import { VectorStore } from '../search/store.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { Orchestrator } from './orchestrator.js';
import type { PipelineSettings } from './types.js';

export interface CreatePipelineOptions {
  logger?: Logger;
  /** Database to use instead of the shared one at storage.database_path */
  db?: Database.Database;
}

export interface Pipeline {
  orchestrator: Orchestrator;
  generator: Generator;
  /** Undefined when safety.enabled is false */
  guard?: SafetyClassifier;
  embeddings: EmbeddingProvider;
  store: VectorStore;
}

export function settingsFromConfig(config: Config): PipelineSettings {
  return {
    topK: config.search.top_k,
    temperature: config.llm.temperature,
    topP: config.llm.top_p,
    maxTokens: config.llm.max_tokens,
    contextWindow: config.llm.context_window,
  };
}

/**
 * The shared database for a config: storage.database_path, else
 * ~/.docent/docent.db.
 */
export function openConfiguredDb(config: Config): Database.Database {
  const path = config.storage.database_path;
  return getDb(path !== undefined ? expandHome(path) : undefined);
}

/**
 * Build every component the query pipeline needs.
 *
 * @throws ConfigError if a backend URL is missing or malformed
 * @throws APIKeyError if an OpenAI-compatible backend has no key
 * @throws DatabaseError if the database cannot be opened
 */
export function createPipeline(config: Config, options: CreatePipelineOptions = {}): Pipeline {
  const logger = options.logger ?? consoleLogger;

  const generator = createGenerator(config, { logger });
  const guard = config.safety.enabled
    ? new SafetyGuard(createGuardGenerator(config, { logger }), { logger })
    : undefined;
  const embeddings = createEmbeddingProvider(config);

  const ops = new DatabaseOperations(options.db ?? openConfiguredDb(config));
  const store = new VectorStore(ops, config.storage.collection, logger);
  const retriever = new VectorRetriever(embeddings, store, {
    minScore: config.search.min_score,
  });

  const promptFile = config.llm.system_prompt_file;
  const prompts = new PromptBuilder({
    systemPromptFile: promptFile !== undefined ? expandHome(promptFile) : undefined,
  });

  const orchestrator = new Orchestrator({
    generator,
    retriever,
    safety: guard,
    prompts,
    settings: settingsFromConfig(config),
    logger,
  });

  return { orchestrator, generator, guard, embeddings, store };
}

export const SAFETY_DISABLED_STATUS: HealthStatus = {
  name: 'safety guard',
  healthy: true,
  message: 'disabled',
  latencyMs: 0,
};

/**
 * Status of the generation backend, the guard model, the embedding provider
 * and the vector store, in that order. Probes run concurrently.
 */
export async function checkHealth(
  pipeline: Omit<Pipeline, 'orchestrator'>,
  signal?: AbortSignal
): Promise<HealthStatus[]> {
  const [generator, guard, embeddings] = await Promise.all([
    pipeline.generator.healthCheck(signal),
    pipeline.guard ? pipeline.guard.healthCheck(signal) : SAFETY_DISABLED_STATUS,
    pipeline.embeddings.healthCheck(signal),
  ]);
  return [generator, guard, embeddings, pipeline.store.healthCheck()];
}
