/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.docent)
 * 2. Load config.toml if it exists (or the file passed with --config)
 * 3. Validate with the Zod schema
 * 4. Merge with defaults, then apply environment overrides
 * 5. Check cross-field rules
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, expandHome } from './paths.js';
import { loadEnv, type EnvVars } from './env.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Explicit config file (--config). Must exist when given. */
  configPath?: string;
  /** Write the template to the default location on first run */
  createIfMissing?: boolean;
  /** Environment overrides; defaults to loadEnv() */
  env?: EnvVars;
}

/**
 * Merge a sparse user config over a complete base, section by section.
 * Arrays are replaced, not concatenated.
 */
export function mergeConfig(base: Config, override: PartialConfig): Config {
  return {
    log_level: override.log_level ?? base.log_level,
    llm: { ...base.llm, ...override.llm },
    embedding: { ...base.embedding, ...override.embedding },
    indexing: {
      ...base.indexing,
      ...override.indexing,
      extensions: override.indexing?.extensions ?? base.indexing.extensions,
      ignore_patterns: override.indexing?.ignore_patterns ?? base.indexing.ignore_patterns,
    },
    search: { ...base.search, ...override.search },
    safety: { ...base.safety, ...override.safety },
    storage: { ...base.storage, ...override.storage },
  };
}

/**
 * Apply DOCENT_* / OLLAMA_HOST / LLAMACPP_URL / OPENAI_BASE_URL overrides.
 */
export function applyEnvOverrides(config: Config, env: EnvVars): Config {
  return {
    ...config,
    log_level: env.DOCENT_LOG_LEVEL ?? config.log_level,
    llm: {
      ...config.llm,
      backend: env.DOCENT_BACKEND ?? config.llm.backend,
      ollama_url: env.OLLAMA_HOST ?? config.llm.ollama_url,
      llamacpp_url: env.LLAMACPP_URL ?? config.llm.llamacpp_url,
      openai_base_url: env.OPENAI_BASE_URL ?? config.llm.openai_base_url,
    },
    safety: { enabled: env.DOCENT_SAFETY ?? config.safety.enabled },
  };
}

/**
 * Rules that span fields. Returns one message per violation.
 */
export function validateConfig(config: Config): string[] {
  const issues: string[] = [];

  if (config.indexing.chunk_overlap >= config.indexing.chunk_tokens) {
    issues.push(
      `indexing.chunk_overlap (${config.indexing.chunk_overlap}) must be less than indexing.chunk_tokens (${config.indexing.chunk_tokens})`
    );
  }

  if (config.llm.system_prompt_file !== undefined) {
    const promptPath = expandHome(config.llm.system_prompt_file);
    if (!fs.existsSync(promptPath)) {
      issues.push(`llm.system_prompt_file does not exist: ${promptPath}`);
    }
  }

  if (config.llm.backend === 'openai-compatible' && config.llm.openai_base_url === undefined) {
    issues.push('llm.openai_base_url is required when llm.backend = "openai-compatible"');
  }

  return issues;
}

function parseConfigFile(configPath: string): PartialConfig {
  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: docent config init --force`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    const issues = validationResult.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${issues}`,
      'Run: docent config init --force  to restore defaults'
    );
  }

  return validationResult.data;
}

/**
 * Write the default template. Refuses to overwrite unless `force` is set.
 *
 * @returns the path written
 */
export function writeConfigTemplate(configPath = getConfigPath(), force = false): string {
  if (fs.existsSync(configPath) && !force) {
    throw new ConfigError(
      `Config file already exists: ${configPath}`,
      'Use --force to overwrite it with the defaults'
    );
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}

/**
 * Load the effective configuration.
 *
 * @throws ConfigError if the file is unreadable, malformed, or breaks a
 *   cross-field rule
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { createIfMissing = true } = options;
  const env = options.env ?? loadEnv();

  let userConfig: PartialConfig = {};

  if (options.configPath !== undefined) {
    const explicitPath = expandHome(options.configPath);
    if (!fs.existsSync(explicitPath)) {
      throw new ConfigError(
        `Config file not found: ${explicitPath}`,
        'Check the --config path, or run: docent config init'
      );
    }
    userConfig = parseConfigFile(explicitPath);
  } else {
    const defaultPath = getConfigPath();
    if (fs.existsSync(defaultPath)) {
      userConfig = parseConfigFile(defaultPath);
    } else if (createIfMissing) {
      writeConfigTemplate(defaultPath);
    }
  }

  const config = applyEnvOverrides(mergeConfig(DEFAULT_CONFIG, userConfig), env);

  // Env overrides bypass the per-file schema, so check the merged result too
  const full = ConfigSchema.safeParse(config);
  const issues = full.success
    ? validateConfig(full.data)
    : full.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }

  return config;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Flatten the config into dot-notation entries for `docent config show`.
 * Example: ['llm.model', 'llama3.1:8b']
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else if (value !== undefined) {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
