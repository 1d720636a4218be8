/**
 * Environment Variable Handler
 *
 * Loads ~/.docent/.env and ./.env via dotenv, then exposes a validated,
 * cached view of the variables docent reads. API keys are looked up by the
 * name configured in `llm.api_key_env` and are never logged.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { getEnvFilePath } from './paths.js';
import { LLMBackendSchema, LogLevelSchema } from './schema.js';

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

const SwitchSchema = z
  .enum(['on', 'off', 'true', 'false', '1', '0'])
  .transform((v) => v === 'on' || v === 'true' || v === '1');

/**
 * Environment overrides. Invalid values are dropped rather than failing
 * startup; the config file stays authoritative for those keys.
 */
export const EnvSchema = z.object({
  DOCENT_BACKEND: LLMBackendSchema.optional().catch(undefined),
  DOCENT_SAFETY: SwitchSchema.optional().catch(undefined),
  DOCENT_LOG_LEVEL: LogLevelSchema.optional().catch(undefined),
  OLLAMA_HOST: z.string().url().optional().catch(undefined),
  LLAMACPP_URL: z.string().url().optional().catch(undefined),
  OPENAI_BASE_URL: z.string().url().optional().catch(undefined),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

let _envCache: EnvVars | null = null;
let _dotenvLoaded = false;

function loadDotenvFiles(): void {
  if (_dotenvLoaded) return;
  _dotenvLoaded = true;
  // Neither call overrides variables already present in process.env
  dotenvConfig({ path: getEnvFilePath() });
  dotenvConfig();
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  loadDotenvFiles();

  _envCache = EnvSchema.parse({
    DOCENT_BACKEND: process.env.DOCENT_BACKEND,
    DOCENT_SAFETY: process.env.DOCENT_SAFETY,
    DOCENT_LOG_LEVEL: process.env.DOCENT_LOG_LEVEL,
    OLLAMA_HOST: process.env.OLLAMA_HOST,
    LLAMACPP_URL: process.env.LLAMACPP_URL,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
  });

  return _envCache;
}

/**
 * Read an API key by variable name. Returns undefined for missing or blank keys.
 */
export function getApiKey(envVar: string): string | undefined {
  loadDotenvFiles();
  const value = process.env[envVar]?.trim();
  return value ? value : undefined;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
