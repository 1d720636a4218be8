/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and as the base that a sparse
 * config.toml is merged on top of.
 */

import type { Config } from './schema.js';

/**
 * Defaults target a local Ollama install with Llama 3.1 8B for answers,
 * Llama Guard 3 1B for safety and nomic-embed-text for embeddings.
 */
export const DEFAULT_CONFIG: Config = {
  log_level: 'info',

  llm: {
    backend: 'ollama',
    model: 'llama3.1:8b',
    guard_model: 'llama-guard3:1b',
    ollama_url: 'http://localhost:11434',
    llamacpp_url: 'http://localhost:8080',
    api_key_env: 'OPENAI_API_KEY',
    temperature: 0.6,
    top_p: 0.9,
    max_tokens: 1024,
    context_window: 8192,
    timeout_ms: 120000,
  },

  // nomic-embed-text produces 768-dimension vectors
  embedding: {
    provider: 'ollama',
    model: 'nomic-embed-text',
    dimensions: 768,
    batch_size: 32,
  },

  indexing: {
    chunk_tokens: 1000,
    chunk_overlap: 200,
    extensions: ['.md', '.markdown', '.txt', '.html', '.htm', '.pdf'],
    ignore_patterns: [],
    max_file_size_mb: 25,
  },

  search: {
    top_k: 6,
    min_score: 0,
  },

  safety: {
    enabled: true,
  },

  storage: {
    collection: 'docs',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.docent/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# docent configuration
# Location: ~/.docent/config.toml

log_level = "${DEFAULT_CONFIG.log_level}"

# Generation backend: "ollama", "llamacpp" (llama-server) or "openai-compatible"
[llm]
backend = "${DEFAULT_CONFIG.llm.backend}"
model = "${DEFAULT_CONFIG.llm.model}"
guard_model = "${DEFAULT_CONFIG.llm.guard_model}"
ollama_url = "${DEFAULT_CONFIG.llm.ollama_url}"
llamacpp_url = "${DEFAULT_CONFIG.llm.llamacpp_url}"
# openai_base_url = "https://api.example.com/v1"
api_key_env = "${DEFAULT_CONFIG.llm.api_key_env}"
temperature = ${DEFAULT_CONFIG.llm.temperature}
top_p = ${DEFAULT_CONFIG.llm.top_p}
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
context_window = ${DEFAULT_CONFIG.llm.context_window}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
# system_prompt_file = "~/.docent/system-prompt.txt"

# Embeddings: dimensions must match the model, changing them requires: docent reset
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}

# Chunk sizes are approximate tokens (1 token ~ 4 characters)
[indexing]
chunk_tokens = ${DEFAULT_CONFIG.indexing.chunk_tokens}
chunk_overlap = ${DEFAULT_CONFIG.indexing.chunk_overlap}
extensions = [${DEFAULT_CONFIG.indexing.extensions.map((e) => `"${e}"`).join(', ')}]
max_file_size_mb = ${DEFAULT_CONFIG.indexing.max_file_size_mb}
# ignore_patterns = ["drafts/", "*.tmp"]

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}
min_score = ${DEFAULT_CONFIG.search.min_score}

# Screen questions and answers with the guard model
[safety]
enabled = ${DEFAULT_CONFIG.safety.enabled}

[storage]
collection = "${DEFAULT_CONFIG.storage.collection}"
# database_path = "~/.docent/docent.db"
`;
