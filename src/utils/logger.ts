/**
 * Logger Interface for Library Code
 *
 * Library modules (ingestion, pipeline, providers) accept a Logger through
 * their options. The CLI passes its CommandContext, which satisfies this
 * interface; tests pass silentLogger or a vi.fn()-backed mock.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Generic logger interface for library code.
 *
 * `debug` and `info` are optional so a CommandContext (or any object with a
 * `warn`) can be passed directly.
 */
export interface Logger {
  warn: (message: string) => void;
  debug?: (message: string) => void;
  info?: (message: string) => void;
  error?: (message: string) => void;
}

/**
 * Whether a message at `level` passes the configured threshold.
 */
export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Create a stderr logger filtered by level.
 *
 * Everything goes to stderr so stdout stays clean for answers and `--json`.
 */
export function createConsoleLogger(threshold: LogLevel = 'info'): Required<Logger> {
  const emit = (level: LogLevel, text: string): void => {
    if (isLevelEnabled(threshold, level)) {
      console.error(text);
    }
  };

  return {
    debug: (message) => emit('debug', chalk.dim(`[debug] ${message}`)),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', chalk.yellow(`Warning: ${message}`)),
    error: (message) => emit('error', chalk.red(`Error: ${message}`)),
  };
}

/** Default logger when none is injected */
export const consoleLogger: Logger = createConsoleLogger('info');

/** Logger that discards everything; for tests and `--json` runs */
export const silentLogger: Required<Logger> = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
