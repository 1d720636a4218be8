/**
 * docent CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createEvalCommand } from './commands/eval.js';
import { createHealthCommand } from './commands/health.js';
import { createIngestCommand } from './commands/ingest.js';
import { createResetCommand } from './commands/reset.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

// Version injected at build time via tsup define
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('docent')
  .description('Question answering over your team documentation, on local models')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('--config <path>', 'Use this config file instead of ~/.docent/config.toml')
  .option('--no-safety', 'Skip the input and output safety checks')

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docent ingest ./docs')}                 Add a directory of documents
  ${chalk.cyan('docent ask "How do I deploy?"')}        Ask a question
  ${chalk.cyan('docent chat')}                          Ask questions interactively
  ${chalk.cyan('docent health')}                        Check backends and storage
  ${chalk.cyan('docent eval -f cases.jsonl')}           Score answers against test cases
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    config: opts.config,
    safety: opts.safety ?? true,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createIngestCommand(getContext));
program.addCommand(createHealthCommand(getContext));
program.addCommand(createResetCommand(getContext));
program.addCommand(createEvalCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: docent --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch, e.g. from readline event handlers
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
