/**
 * Eval Command
 *
 * Runs a JSONL file of test questions through the pipeline and reports
 * response time, relevance, safety blocks and keyword hits:
 *
 *   docent eval --test-file cases.jsonl
 *   docent eval --test-file cases.jsonl --output report.json
 *
 * Exits with code 1 when any case fails.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type { CommandContext } from '../types.js';
import { abortOnInterrupt, createCommandLogger, loadCommandConfig } from '../utils/runtime.js';
import { createPipeline } from '../../agent/factory.js';
import { closeDb } from '../../database/index.js';
import { loadEvalCases, writeEvalReport } from '../../eval/dataset.js';
import { runEvaluation } from '../../eval/runner.js';
import type { EvalCaseResult, EvalReport } from '../../eval/types.js';
import { formatTable, type Column } from '../../utils/table.js';

interface EvalCommandOptions {
  testFile: string;
  output?: string;
}

const RESULT_COLUMNS: Column<EvalCaseResult>[] = [
  {
    header: 'Result',
    value: (r) => (r.error ? chalk.red('ERROR') : r.passed ? chalk.green('PASS') : chalk.red('FAIL')),
  },
  { header: 'Question', value: (r) => truncate(r.question, 48) },
  { header: 'Time', value: (r) => `${r.responseTimeMs}ms`, align: 'right' },
  { header: 'Relevance', value: (r) => r.relevanceScore.toFixed(2), align: 'right' },
  {
    header: 'Keywords',
    value: (r) =>
      r.keywordHitRatio === undefined
        ? '-'
        : `${r.keywordsFound.length}/${r.keywordsFound.length + r.keywordsMissing.length}`,
    align: 'right',
  },
  { header: 'Blocked', value: (r) => (r.blocked ? 'yes' : 'no') },
];

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

/**
 * Human-readable report: per-case table, then the summary.
 */
export function formatEvalReport(report: EvalReport): string {
  const { summary } = report;
  const lines = [
    formatTable(RESULT_COLUMNS, report.results),
    '',
    chalk.bold('Summary'),
    `  ${chalk.dim('Cases:')}             ${summary.total}`,
    `  ${chalk.dim('Passed:')}            ${summary.passed}`,
    `  ${chalk.dim('Failed:')}            ${summary.failed}${summary.errors > 0 ? ` (${summary.errors} errors)` : ''}`,
    `  ${chalk.dim('Avg response time:')} ${summary.avgResponseTimeMs}ms`,
    `  ${chalk.dim('Avg relevance:')}     ${summary.avgRelevanceScore.toFixed(3)}`,
    `  ${chalk.dim('Keyword hit rate:')}  ${(summary.keywordHitRate * 100).toFixed(1)}%`,
    `  ${chalk.dim('Safety blocks:')}     ${summary.safetyBlocks}`,
  ];

  const errored = report.results.filter((r) => r.error !== undefined);
  if (errored.length > 0) {
    lines.push('', chalk.red('Errors:'));
    for (const r of errored) {
      lines.push(`  - ${truncate(r.question, 48)}: ${r.error ?? ''}`);
    }
  }

  return lines.join('\n');
}

export function createEvalCommand(getContext: () => CommandContext): Command {
  return new Command('eval')
    .description('Evaluate answer quality against a JSONL file of test questions')
    .requiredOption('-f, --test-file <path>', 'JSONL file of test cases')
    .option('-o, --output <path>', 'Write the full report as JSON')
    .action(async (cmdOptions: EvalCommandOptions) => {
      const ctx = getContext();

      const testFile = resolve(cmdOptions.testFile);
      const cases = loadEvalCases(testFile);
      ctx.debug(`Loaded ${cases.length} cases from ${testFile}`);

      const config = loadCommandConfig(ctx.options);
      const pipeline = createPipeline(config, {
        logger: createCommandLogger(ctx.options, config),
      });

      const interrupt = abortOnInterrupt();
      const spinner: Ora | null =
        !ctx.options.json && process.stderr.isTTY === true
          ? ora({ stream: process.stderr }).start()
          : null;

      let report: EvalReport;
      try {
        report = await runEvaluation(pipeline.orchestrator, cases, {
          testFile,
          signal: interrupt.signal,
          onCaseStart: (index, total, question) => {
            if (spinner) {
              spinner.text = `[${index + 1}/${total}] ${truncate(question, 60)}`;
            } else {
              ctx.debug(`[${index + 1}/${total}] ${question}`);
            }
          },
        });
      } finally {
        spinner?.stop();
        interrupt.dispose();
        closeDb();
      }

      if (cmdOptions.output) {
        const outputPath = resolve(cmdOptions.output);
        writeEvalReport(outputPath, report);
        ctx.debug(`Report written to ${outputPath}`);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        ctx.log(formatEvalReport(report));
        if (cmdOptions.output) {
          ctx.log('');
          ctx.log(chalk.dim(`Report written to ${resolve(cmdOptions.output)}`));
        }
      }

      if (report.summary.failed > 0) {
        process.exitCode = 1;
      }
    });
}
