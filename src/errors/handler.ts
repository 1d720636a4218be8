/**
 * Error formatting and process exit handling for the CLI.
 *
 * Text output goes to stderr with chalk colours; `--json` switches to a
 * structured object so scripts can read the exit code and failing stage.
 */

import chalk from 'chalk';
import { CLIError, PipelineError, isCancellationError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Pipeline stage that failed, for query errors */
  stage?: string;
  stack?: string;
}

/** Exit code used when the user interrupts a query (128 + SIGINT) */
export const CANCELLED_EXIT_CODE = 130;

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: getExitCode(error),
        hint: error.hint,
        stage: error instanceof PipelineError ? error.stage : undefined,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    if (verbose && error instanceof PipelineError && error.cause instanceof Error) {
      lines.push(chalk.dim('Caused by: ') + `${error.cause.name}: ${error.cause.message}`);
    }

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: getExitCode(error),
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    return lines.join('\n');
  }

  // Non-Error throwables (string, number, ...)
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 *
 * Cancellation wins over the error's own code, so an interrupted query exits
 * with 130 whichever layer noticed the abort.
 */
export function getExitCode(error: unknown): number {
  if (isCancellationError(error)) {
    return CANCELLED_EXIT_CODE;
  }
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a handler for process-level `uncaughtException` / `unhandledRejection`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
