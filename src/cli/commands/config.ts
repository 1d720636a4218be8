/**
 * Config Command
 *
 * Inspects and creates ~/.docent/config.toml:
 *   docent config path          - Show config file location
 *   docent config show          - Show the effective configuration
 *   docent config init [--force] - Write the commented default template
 *
 * `show` includes environment overrides and the global --no-safety flag.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandConfig } from '../utils/runtime.js';
import { expandHome, getConfigPath, listConfig, writeConfigTemplate } from '../../config/index.js';

/**
 * Config file the command operates on: --config when given, else the default.
 */
function configPathFor(ctx: CommandContext): string {
  return ctx.options.config !== undefined ? expandHome(ctx.options.config) : getConfigPath();
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Inspect and create the configuration file');

  // docent config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = configPathFor(ctx);

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // docent config show
  configCmd
    .command('show')
    .alias('list')
    .description('Show the effective configuration')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(loadCommandConfig(ctx.options));

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by top-level key for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${configPathFor(ctx)}`));
    });

  // docent config init
  configCmd
    .command('init')
    .description('Write the default configuration template')
    .option('-f, --force', 'Overwrite an existing file')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      const written = writeConfigTemplate(configPathFor(ctx), options.force ?? false);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: written }));
      } else {
        ctx.log(`${chalk.green('✓')} Wrote ${chalk.cyan(written)}`);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}
