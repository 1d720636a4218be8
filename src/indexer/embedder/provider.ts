/**
 * Embedding Provider
 *
 * OpenAI SDK embeddings client for Ollama and OpenAI-compatible endpoints,
 * plus the factory that reads the `[embedding]` config section.
 */

import type OpenAI from 'openai';

import type { Config } from '../../config/index.js';
import { getApiKey } from '../../config/index.js';
import { APIKeyError, BackendError, ConfigError } from '../../errors/index.js';
import { apiRootFor, createClient, toBackendError } from '../../providers/client.js';
import { probeOllama, probeOpenAICompatible } from '../../providers/health.js';
import type { HealthStatus } from '../../providers/types.js';
import { validateBackendUrl } from '../../providers/validation.js';
import type { EmbeddingProvider, EmbeddingProviderSpec } from './types.js';

export const EMBEDDINGS_NAME = 'embeddings';

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = EMBEDDINGS_NAME;
  readonly model: string;
  readonly dimensions: number;

  private readonly client: OpenAI;

  constructor(private readonly spec: EmbeddingProviderSpec) {
    this.model = spec.model;
    this.dimensions = spec.dimensions;
    this.client = createClient({
      baseUrl: apiRootFor(spec.kind, spec.baseUrl),
      timeoutMs: spec.timeoutMs,
      apiKey: spec.kind === 'openai-compatible' ? spec.apiKey : undefined,
    });
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await this.client.embeddings.create(
        { model: this.model, input: texts, encoding_format: 'float' },
        { signal }
      );

      const vectors = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => new Float32Array(item.embedding));

      if (vectors.length !== texts.length) {
        throw BackendError.request(
          this.name,
          `expected ${texts.length} embeddings, got ${vectors.length}`
        );
      }
      for (const vector of vectors) {
        if (vector.length !== this.dimensions) {
          throw BackendError.request(
            this.name,
            `expected ${this.dimensions}-dimensional embeddings from ${this.model}, got ${vector.length} (check embedding.dimensions)`
          );
        }
      }

      return vectors;
    } catch (error) {
      throw toBackendError(this.name, error, signal);
    }
  }

  healthCheck(signal?: AbortSignal): Promise<HealthStatus> {
    const { spec } = this;
    return spec.kind === 'ollama'
      ? probeOllama(this.name, spec.baseUrl, spec.model, signal)
      : probeOpenAICompatible(this.name, spec.baseUrl, spec.apiKey, signal);
  }
}

/**
 * Build the embedding spec. Ollama embeddings use `llm.ollama_url`;
 * OpenAI-compatible ones share `llm.openai_base_url` and its key.
 *
 * @throws ConfigError if the URL is missing or malformed
 * @throws APIKeyError if an OpenAI-compatible endpoint has no key
 */
export function embeddingSpecFromConfig(config: Config): EmbeddingProviderSpec {
  const { embedding, llm } = config;
  const common = {
    model: embedding.model,
    dimensions: embedding.dimensions,
    timeoutMs: llm.timeout_ms,
  };

  if (embedding.provider === 'ollama') {
    const check = validateBackendUrl('ollama', llm.ollama_url);
    if (!check.valid) {
      throw new ConfigError(check.error, check.setupInstructions);
    }
    return { kind: 'ollama', baseUrl: llm.ollama_url, ...common };
  }

  const baseUrl = llm.openai_base_url;
  const check = validateBackendUrl('openai-compatible', baseUrl);
  if (!check.valid || baseUrl === undefined) {
    throw new ConfigError(
      check.valid ? 'No URL configured for openai-compatible' : check.error,
      'Set llm.openai_base_url in ~/.docent/config.toml or OPENAI_BASE_URL'
    );
  }
  const apiKey = getApiKey(llm.api_key_env);
  if (apiKey === undefined) {
    throw new APIKeyError('openai-compatible', llm.api_key_env);
  }
  return { kind: 'openai-compatible', baseUrl, apiKey, ...common };
}

/**
 * Create the configured embedding provider.
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(config);
 * const [vector] = await provider.embed(['How do I deploy?']);
 * ```
 */
export function createEmbeddingProvider(config: Config): EmbeddingProvider {
  return new OpenAIEmbeddingProvider(embeddingSpecFromConfig(config));
}
