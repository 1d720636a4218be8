/**
 * Generator Factory
 *
 * Turns the `[llm]` config section into BackendSpecs and Generators. The
 * answer model and the guard model share the backend; only the model differs.
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const generator = createGenerator(config, { logger });
 * const guard = createGuardGenerator(config, { logger });
 * ```
 */

import type { Config } from '../config/index.js';
import { getApiKey } from '../config/index.js';
import { APIKeyError, ConfigError } from '../errors/index.js';
import type { Logger } from '../utils/index.js';
import { ChatGenerator } from './chat.js';
import type { BackendSpec, Generator } from './types.js';
import { validateBackendUrl } from './validation.js';

export interface GeneratorFactoryOptions {
  logger?: Logger;
}

/**
 * Build the BackendSpec for the configured backend and the given model.
 *
 * @throws ConfigError if the backend URL is missing or malformed
 * @throws APIKeyError if an OpenAI-compatible backend has no key
 */
export function backendSpecFromConfig(config: Config, model: string = config.llm.model): BackendSpec {
  const { llm } = config;
  const timeoutMs = llm.timeout_ms;

  switch (llm.backend) {
    case 'ollama': {
      ensureUrl('ollama', llm.ollama_url);
      return { kind: 'ollama', baseUrl: llm.ollama_url, model, timeoutMs };
    }
    case 'llamacpp': {
      ensureUrl('llamacpp', llm.llamacpp_url);
      return { kind: 'llamacpp', baseUrl: llm.llamacpp_url, model, timeoutMs };
    }
    case 'openai-compatible': {
      const baseUrl = ensureUrl('openai-compatible', llm.openai_base_url);
      const apiKey = getApiKey(llm.api_key_env);
      if (apiKey === undefined) {
        throw new APIKeyError('openai-compatible', llm.api_key_env);
      }
      return { kind: 'openai-compatible', baseUrl, model, timeoutMs, apiKey };
    }
  }
}

function ensureUrl(kind: BackendSpec['kind'], url: string | undefined): string {
  const result = validateBackendUrl(kind, url);
  if (!result.valid) {
    throw new ConfigError(result.error, result.setupInstructions);
  }
  return url ?? '';
}

/**
 * Generator for answers, using `llm.model`.
 */
export function createGenerator(config: Config, options: GeneratorFactoryOptions = {}): Generator {
  return new ChatGenerator(backendSpecFromConfig(config), {
    name: config.llm.backend,
    logger: options.logger,
  });
}

/**
 * Generator for the safety classifier, using `llm.guard_model`.
 */
export function createGuardGenerator(
  config: Config,
  options: GeneratorFactoryOptions = {}
): Generator {
  return new ChatGenerator(backendSpecFromConfig(config, config.llm.guard_model), {
    name: `${config.llm.backend} guard`,
    logger: options.logger,
  });
}
