/**
 * Shared setup for commands that touch the pipeline: the effective config
 * after global flags, a library logger that matches the output mode, and
 * an AbortController tied to Ctrl+C.
 */

import { loadConfig, type Config } from '../../config/index.js';
import { createConsoleLogger, type Logger, type LogLevel } from '../../utils/logger.js';
import type { GlobalOptions } from '../types.js';

/**
 * Load the config named by `--config` (or the default one) and apply
 * `--no-safety`.
 */
export function loadCommandConfig(options: GlobalOptions): Config {
  const config = loadConfig({ configPath: options.config });
  if (options.safety) {
    return config;
  }
  return { ...config, safety: { ...config.safety, enabled: false } };
}

/**
 * Logger for library code. Writes to stderr; `--verbose` lowers the
 * threshold to debug and `--json` raises it to errors only.
 */
export function createCommandLogger(options: GlobalOptions, config: Config): Logger {
  let threshold: LogLevel = config.log_level;
  if (options.json) {
    threshold = 'error';
  } else if (options.verbose) {
    threshold = 'debug';
  }
  return createConsoleLogger(threshold);
}

/**
 * An AbortController that aborts on the first SIGINT. Call `dispose` when
 * the work is done so the process regains its default Ctrl+C handling.
 */
export function abortOnInterrupt(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onInterrupt);
    },
  };
}
