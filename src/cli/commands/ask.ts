/**
 * Ask Command
 *
 * One question through the full pipeline:
 *
 *   docent ask "How do I rotate the API keys?"
 *   docent ask "..." --top-k 10 --temperature 0.2
 *   docent ask "..." --stream      # print tokens as they arrive
 *   docent ask "..." --json        # machine-readable result
 *
 * With safety checks on, `--stream` only shows stage progress: the answer
 * is printed once the output check has passed.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type { CommandContext } from '../types.js';
import { createPipeline } from '../../agent/factory.js';
import type { PipelineResult, PipelineStage } from '../../agent/types.js';
import { closeDb } from '../../database/index.js';
import { CLIError } from '../../errors/index.js';
import { AskOptionsSchema, validateInput, type AskOptionsInput } from '../validation.js';
import { abortOnInterrupt, createCommandLogger, loadCommandConfig } from '../utils/runtime.js';

const STAGE_TEXT: Record<PipelineStage, string> = {
  INPUT_CHECK: 'Checking question...',
  RETRIEVE: 'Searching documents...',
  PROMPT_BUILD: 'Building prompt...',
  GENERATE: 'Generating answer...',
  OUTPUT_CHECK: 'Checking answer...',
  FORMAT: 'Formatting...',
};

/**
 * Shape of `docent ask --json` output.
 */
export interface AskJsonOutput {
  question: string;
  answer: string;
  blocked?: 'input' | 'output';
  category?: string;
  sources: Array<{ index: number; title: string; path: string; score: number }>;
  durationMs: number;
}

export function toJsonOutput(question: string, result: PipelineResult): AskJsonOutput {
  return {
    question,
    answer: result.answer,
    blocked: result.blocked,
    category: result.category,
    sources: result.sources.map((chunk, i) => ({
      index: i + 1,
      title: chunk.sourceTitle,
      path: chunk.sourcePath,
      score: chunk.score ?? 0,
    })),
    durationMs: result.durationMs,
  };
}

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question about your documentation')
    .description('Ask a question answered from the ingested documents')
    .option('-k, --top-k <number>', 'Number of chunks to retrieve')
    .option('-t, --temperature <number>', 'Sampling temperature (0 uses the configured value)')
    .option('-s, --stream', 'Print the answer as it is generated', false)
    .action(async (question: string, cmdOptions: AskOptionsInput) => {
      const ctx = getContext();

      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: docent ask "How do I deploy?"'
        );
      }

      const { topK, temperature, stream } = validateInput(AskOptionsSchema, cmdOptions);
      ctx.debug(`Question: "${trimmedQuestion}"`);
      ctx.debug(`Options: top-k=${topK ?? 'default'} temperature=${temperature ?? 'default'}`);

      const config = loadCommandConfig(ctx.options);
      const pipeline = createPipeline(config, {
        logger: createCommandLogger(ctx.options, config),
      });
      if (!pipeline.orchestrator.safetyEnabled) {
        ctx.debug('Safety checks disabled');
      }

      const interrupt = abortOnInterrupt();
      const askOptions = { topK, temperature, signal: interrupt.signal };
      const showProgress = !ctx.options.json && process.stderr.isTTY === true;
      let spinner: Ora | null = null;

      try {
        let result: PipelineResult | undefined;
        let streamed = false;

        if (stream && !ctx.options.json) {
          for await (const event of pipeline.orchestrator.askStream(trimmedQuestion, askOptions)) {
            if (event.type === 'stage') {
              if (event.stage === 'GENERATE' && !pipeline.orchestrator.safetyEnabled) {
                spinner?.stop();
                spinner = null;
              } else if (showProgress) {
                spinner = spinner ?? ora({ stream: process.stderr }).start();
                spinner.text = STAGE_TEXT[event.stage];
              }
            } else if (event.type === 'token') {
              streamed = true;
              process.stdout.write(event.text);
            } else {
              result = event.result;
            }
          }
        } else {
          if (showProgress) {
            spinner = ora({ text: 'Thinking...', stream: process.stderr }).start();
          }
          result = await pipeline.orchestrator.ask(trimmedQuestion, askOptions);
        }

        spinner?.stop();
        spinner = null;

        if (!result) {
          throw new CLIError('Query ended without a result');
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(toJsonOutput(trimmedQuestion, result), null, 2));
          return;
        }

        if (streamed) {
          // Tokens already printed; add the source list after them
          const sourceList = result.answerText.slice(result.answerText.indexOf('\n\n**Sources:**'));
          console.log(result.sources.length > 0 ? sourceList : '');
        } else if (result.blocked) {
          console.log(chalk.yellow(result.answerText));
        } else {
          console.log(result.answerText);
        }

        ctx.debug(`Completed in ${result.durationMs}ms`);
      } finally {
        spinner?.stop();
        interrupt.dispose();
        closeDb();
      }
    });
}
