/**
 * Backend Settings Validators
 *
 * Checks backend URLs before a client is created, so that a
 * misconfiguration fails with setup instructions instead of a socket error.
 */

import { z } from 'zod';

import type { BackendKind } from './types.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Discriminated result: `{ valid: true }` or an error with setup instructions.
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// SCHEMAS
// ============================================================================

/**
 * Backend base URL: a valid HTTP(S) URL.
 */
export const BackendUrlSchema = z
  .string()
  .url('Invalid backend URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Backend URL must be an HTTP(S) URL'
  );

export const SETUP_INSTRUCTIONS: Readonly<Record<BackendKind, string>> = {
  ollama: [
    'Start Ollama and pull the models:',
    '  ollama serve',
    '  ollama pull llama3.1:8b',
    'Set llm.ollama_url in ~/.docent/config.toml or OLLAMA_HOST if it runs elsewhere.',
  ].join('\n'),
  llamacpp: [
    'Start the llama.cpp server:',
    '  llama-server -m model.gguf --port 8080',
    'Set llm.llamacpp_url in ~/.docent/config.toml or LLAMACPP_URL if it runs elsewhere.',
  ].join('\n'),
  'openai-compatible': [
    'Point docent at the endpoint and provide a key:',
    '  [llm] openai_base_url = "https://host/v1"   (or OPENAI_BASE_URL)',
    '  export OPENAI_API_KEY=...                   (or llm.api_key_env)',
  ].join('\n'),
};

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate a backend base URL.
 *
 * @example
 * ```typescript
 * const result = validateBackendUrl('ollama', config.llm.ollama_url);
 * if (!result.valid) {
 *   ctx.error(result.error);
 *   ctx.log(result.setupInstructions);
 * }
 * ```
 */
export function validateBackendUrl(kind: BackendKind, url: string | undefined): ValidationResult {
  const result = BackendUrlSchema.safeParse(url);

  if (!result.success) {
    return {
      valid: false,
      error:
        url === undefined
          ? `No URL configured for ${kind}`
          : (result.error.issues[0]?.message ?? 'Invalid backend URL'),
      setupInstructions: SETUP_INSTRUCTIONS[kind],
    };
  }

  return { valid: true };
}

