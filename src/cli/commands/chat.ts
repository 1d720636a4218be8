/**
 * Chat Command
 *
 * Interactive REPL over the query pipeline. Each line is an independent
 * question; no conversation history is carried between turns.
 *
 *   docent chat
 *
 * REPL Commands:
 *   /help     - Show available commands
 *   /sources  - Toggle the source list under answers
 *   exit      - Exit the chat (also: quit, Ctrl+D)
 *
 * Ctrl+C cancels the question being answered; at the prompt it exits.
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createPipeline } from '../../agent/factory.js';
import type { Orchestrator } from '../../agent/orchestrator.js';
import { closeDb } from '../../database/index.js';
import { CLIError, isCancellationError } from '../../errors/index.js';
import { createCommandLogger, loadCommandConfig } from '../utils/runtime.js';

/**
 * Mutable state for one chat session.
 */
export interface ChatState {
  orchestrator: Pick<Orchestrator, 'ask'>;
  /** Append the numbered source list to answers */
  showSources: boolean;
  /** Aborts the question in flight */
  inflight?: AbortController;
}

const EXIT_WORDS = new Set(['exit', 'quit']);

const HELP_TEXT = [
  chalk.bold('Commands:'),
  `  ${chalk.cyan('/sources')}  Toggle the source list under answers`,
  `  ${chalk.cyan('/help')}     Show this help`,
  `  ${chalk.cyan('exit')}      Leave the chat`,
].join('\n');

/**
 * Handle one line of input.
 *
 * @returns false when the session should end
 */
export async function handleChatLine(
  line: string,
  state: ChatState,
  ctx: CommandContext
): Promise<boolean> {
  const input = line.trim();
  if (!input) {
    return true;
  }

  if (EXIT_WORDS.has(input.toLowerCase())) {
    return false;
  }

  if (input.startsWith('/')) {
    handleReplCommand(input, state, ctx);
    return true;
  }

  const controller = new AbortController();
  state.inflight = controller;
  try {
    const result = await state.orchestrator.ask(input, { signal: controller.signal });
    if (result.blocked) {
      ctx.log(chalk.yellow(result.answerText));
    } else {
      ctx.log(state.showSources ? result.answerText : result.answer);
    }
  } catch (error) {
    if (isCancellationError(error)) {
      ctx.log(chalk.dim('Cancelled.'));
    } else if (error instanceof CLIError) {
      ctx.error(error.message);
      if (error.hint) {
        ctx.log(chalk.dim(error.hint));
      }
    } else {
      ctx.error(`Failed to answer: ${error instanceof Error ? error.message : String(error)}`);
    }
  } finally {
    state.inflight = undefined;
  }
  ctx.log('');
  return true;
}

function handleReplCommand(input: string, state: ChatState, ctx: CommandContext): void {
  const command = input.slice(1).split(/\s+/)[0]?.toLowerCase() ?? '';

  switch (command) {
    case 'sources':
      state.showSources = !state.showSources;
      ctx.log(chalk.dim(`Sources ${state.showSources ? 'shown' : 'hidden'}.`));
      return;
    case 'help':
      ctx.log(HELP_TEXT);
      return;
    default:
      ctx.log(chalk.yellow(`Unknown command: /${command}`));
      ctx.log(chalk.dim('Type /help for available commands.'));
  }
}

/**
 * Main REPL loop. Lines are handled one at a time: input that arrives while
 * a question is being answered waits its turn.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: chalk.cyan('docent> '),
  });

  let queue = Promise.resolve(true);
  let closed = false;

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      queue = queue.then(async (keepGoing) => {
        if (!keepGoing || closed) {
          return false;
        }
        const next = await handleChatLine(line, state, ctx);
        if (next) {
          rl.prompt();
        } else {
          rl.close();
        }
        return next;
      });
    });

    rl.on('SIGINT', () => {
      if (state.inflight) {
        state.inflight.abort();
        return;
      }
      rl.close();
    });

    rl.on('close', () => {
      closed = true;
      state.inflight?.abort();
      queue.then(
        () => resolve(),
        () => resolve()
      );
    });

    rl.prompt();
  });
}

export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive question answering over the ingested documents')
    .action(async () => {
      const ctx = getContext();
      const config = loadCommandConfig(ctx.options);
      const pipeline = createPipeline(config, {
        logger: createCommandLogger(ctx.options, config),
      });

      const state: ChatState = {
        orchestrator: pipeline.orchestrator,
        showSources: true,
      };

      ctx.log(chalk.bold('docent chat'));
      ctx.log(
        chalk.dim(
          `Model: ${pipeline.generator.model} · Safety: ${pipeline.orchestrator.safetyEnabled ? 'on' : 'off'} · Type /help for commands, exit to quit`
        )
      );
      ctx.log('');

      try {
        await runChatREPL(state, ctx);
      } finally {
        closeDb();
      }
      ctx.log(chalk.dim('Goodbye!'));
    });
}
