/**
 * Health Command
 *
 * Probes every backend the pipeline depends on:
 *
 *   docent health
 *   docent health --json
 *
 * Exits with code 1 when any check fails.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCommandLogger, loadCommandConfig } from '../utils/runtime.js';
import { checkHealth, createPipeline } from '../../agent/factory.js';
import { closeDb } from '../../database/index.js';
import type { HealthStatus } from '../../providers/types.js';
import { formatTable, type Column } from '../../utils/table.js';

const HEALTH_COLUMNS: Column<HealthStatus>[] = [
  { header: 'Check', value: (s) => s.name },
  { header: 'Status', value: (s) => (s.healthy ? chalk.green('ok') : chalk.red('failed')) },
  { header: 'Latency', value: (s) => `${s.latencyMs}ms`, align: 'right' },
  { header: 'Details', value: (s) => s.message },
];

export function formatHealthTable(statuses: HealthStatus[]): string {
  return formatTable(HEALTH_COLUMNS, statuses);
}

export function createHealthCommand(getContext: () => CommandContext): Command {
  return new Command('health')
    .description('Check the generation, guard and embedding backends and the vector store')
    .action(async () => {
      const ctx = getContext();
      const config = loadCommandConfig(ctx.options);

      try {
        const pipeline = createPipeline(config, {
          logger: createCommandLogger(ctx.options, config),
        });
        const statuses = await checkHealth(pipeline);
        const healthy = statuses.every((s) => s.healthy);

        if (ctx.options.json) {
          console.log(JSON.stringify({ healthy, checks: statuses }, null, 2));
        } else {
          ctx.log(formatHealthTable(statuses));
          ctx.log('');
          ctx.log(
            healthy
              ? chalk.green('All checks passed')
              : chalk.red(`${statuses.filter((s) => !s.healthy).length} check(s) failed`)
          );
        }

        if (!healthy) {
          process.exitCode = 1;
        }
      } finally {
        closeDb();
      }
    });
}
