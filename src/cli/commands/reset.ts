/**
 * Reset Command
 *
 * Deletes the configured collection and every chunk in it:
 *   docent reset          - Asks for confirmation first
 *   docent reset --force  - No confirmation
 *
 * With --json there is no prompt, so --force is required.
 */

import * as readline from 'node:readline/promises';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandConfig } from '../utils/runtime.js';
import { openConfiguredDb } from '../../agent/factory.js';
import { closeDb, DatabaseOperations } from '../../database/index.js';
import { VectorStore } from '../../search/store.js';
import { silentLogger } from '../../utils/logger.js';

interface ResetOptions {
  force?: boolean;
}

/**
 * Ask a yes/no question on the terminal. Anything but "y" or "yes" is no.
 */
export async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} ${chalk.dim('[y/N]')} `);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

export function createResetCommand(
  getContext: () => CommandContext,
  ask: (question: string) => Promise<boolean> = confirm
): Command {
  return new Command('reset')
    .description('Delete every ingested chunk in the configured collection')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(async (options: ResetOptions) => {
      const ctx = getContext();
      const config = loadCommandConfig(ctx.options);
      const collection = config.storage.collection;

      try {
        const store = new VectorStore(
          new DatabaseOperations(openConfiguredDb(config)),
          collection,
          silentLogger
        );
        const count = store.count();
        ctx.debug(`Collection "${collection}" holds ${count} chunks`);

        if (!options.force) {
          if (ctx.options.json) {
            console.log(JSON.stringify({ success: false, error: 'Use --force to reset in --json mode' }));
            process.exitCode = 1;
            return;
          }
          const proceed = await ask(
            chalk.yellow(`Delete all ${count.toLocaleString()} chunks in "${collection}"?`)
          );
          if (!proceed) {
            ctx.log('Aborted.');
            return;
          }
        }

        const deleted = store.reset();

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, collection, deleted }));
        } else {
          ctx.log(`${chalk.green('✓')} Deleted ${deleted.toLocaleString()} chunks from "${chalk.cyan(collection)}"`);
        }
      } finally {
        closeDb();
      }
    });
}
