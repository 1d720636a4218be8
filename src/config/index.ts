/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `docent config` commands.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  LLMConfigSchema,
  EmbeddingConfigSchema,
  IndexingConfigSchema,
  SearchConfigSchema,
  LLMBackendSchema,
  EmbeddingProviderTypeSchema,
} from './schema.js';
export type { Config, PartialConfig, LLMBackend, EmbeddingProviderType } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export {
  loadConfig,
  mergeConfig,
  applyEnvOverrides,
  validateConfig,
  writeConfigTemplate,
  listConfig,
  type LoadConfigOptions,
} from './loader.js';

export { getDocentDir, getDbPath, getConfigPath, getEnvFilePath, expandHome } from './paths.js';

export { loadEnv, getApiKey, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
