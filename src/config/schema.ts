/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docent/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 *
 * Cross-field rules (chunk_overlap < chunk_tokens, system prompt file exists)
 * live in validateConfig() in loader.ts, since a refined schema cannot be
 * deep-partialled.
 */

import { z } from 'zod';

/**
 * Generation backends. Each one is reached through the OpenAI-compatible
 * chat API it exposes.
 */
export const LLMBackendSchema = z.enum(['ollama', 'llamacpp', 'openai-compatible']);
export type LLMBackend = z.infer<typeof LLMBackendSchema>;

export const EmbeddingProviderTypeSchema = z.enum(['ollama', 'openai-compatible']);
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Generation and safety-classifier model settings
 */
export const LLMConfigSchema = z.object({
  backend: LLMBackendSchema.describe('Generation backend (ollama, llamacpp, openai-compatible)'),
  model: z.string().min(1).describe('Model used to answer questions'),
  guard_model: z.string().min(1).describe('Safety classifier model (Llama Guard family)'),
  ollama_url: z.string().url().describe('Ollama server URL'),
  llamacpp_url: z.string().url().describe('llama.cpp server URL'),
  openai_base_url: z
    .string()
    .url()
    .optional()
    .describe('Base URL for an OpenAI-compatible API (backend = "openai-compatible")'),
  api_key_env: z
    .string()
    .min(1)
    .describe('Environment variable holding the API key for openai-compatible backends'),
  temperature: z.number().min(0).max(2).describe('Default sampling temperature (0-2)'),
  top_p: z.number().min(0).max(1).describe('Nucleus sampling threshold (0-1)'),
  max_tokens: z.number().int().min(1).max(32768).describe('Maximum tokens to generate'),
  context_window: z.number().int().min(512).describe('Model context window in tokens'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for a single generation request'),
  system_prompt_file: z
    .string()
    .optional()
    .describe('Path to a file whose contents replace the built-in system prompt'),
});

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z.number().int().min(1).describe('Vector dimensions produced by the model'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(512)
    .describe('Number of texts to embed per request'),
});

/**
 * Document discovery and chunking
 */
export const IndexingConfigSchema = z.object({
  chunk_tokens: z
    .number()
    .int()
    .min(100)
    .max(4000)
    .describe('Target chunk size in approximate tokens (1 token ≈ 4 chars)'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .describe('Tokens shared between consecutive chunks; must be below chunk_tokens'),
  extensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/i, 'Extensions must look like ".md"'))
    .min(1)
    .describe('File extensions to ingest'),
  ignore_patterns: z
    .array(z.string())
    .describe('Additional gitignore-style patterns to skip during ingestion'),
  max_file_size_mb: z.number().positive().describe('Files larger than this are skipped'),
});

/**
 * Retrieval settings
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Number of chunks to retrieve per question'),
  min_score: z.number().min(0).max(1).describe('Drop chunks scoring below this relevance'),
});

export const SafetyConfigSchema = z.object({
  enabled: z.boolean().describe('Screen questions and answers with the guard model'),
});

export const StorageConfigSchema = z.object({
  collection: z
    .string()
    .regex(/^[a-zA-Z0-9_-]+$/, 'Collection names may only contain letters, digits, _ and -')
    .describe('Collection holding the ingested chunks'),
  database_path: z
    .string()
    .optional()
    .describe('SQLite database path (defaults to ~/.docent/docent.db)'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  log_level: LogLevelSchema,
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  indexing: IndexingConfigSchema,
  search: SearchConfigSchema,
  safety: SafetyConfigSchema,
  storage: StorageConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
