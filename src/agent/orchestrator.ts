/**
 * Query Orchestrator
 *
 * Runs one question through the pipeline:
 *
 * ```
 * question
 *    │
 *    ▼
 * INPUT_CHECK ── unsafe ──► refusal (retriever and generator never called)
 *    │
 * RETRIEVE      top-K chunks; none is fine
 *    │
 * PROMPT_BUILD  grounded prompt + system prompt
 *    │
 * GENERATE      one request, no retries
 *    │
 * OUTPUT_CHECK ── unsafe ──► refusal (answer and sources dropped)
 *    │
 * FORMAT        answer + numbered sources
 * ```
 *
 * Safety checks are skipped when no classifier is given. Every failure is
 * rethrown as a PipelineError carrying the stage it happened in.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({ generator, retriever, safety, settings });
 *
 * const result = await orchestrator.ask('How do I deploy?');
 * console.log(result.answerText);
 *
 * for await (const event of orchestrator.askStream('How do I deploy?', { signal })) {
 *   if (event.type === 'token') process.stdout.write(event.text);
 * }
 * ```
 */

import { BackendError, PipelineError, type PipelineStage } from '../errors/index.js';
import { estimateTokens } from '../indexer/chunker/config.js';
import type { DocumentChunk } from '../indexer/chunker/types.js';
import { PromptBuilder } from '../prompt/builder.js';
import type { GenerationRequest, Generator } from '../providers/types.js';
import { refusalMessage } from '../safety/parser.js';
import type { SafetyClassifier, SafetyVerdict } from '../safety/types.js';
import type { Retriever } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { AskOptions, PipelineEvent, PipelineResult, PipelineSettings } from './types.js';

export interface OrchestratorOptions {
  generator: Generator;
  retriever: Retriever;
  settings: PipelineSettings;
  /** Screens questions and answers; omit to turn safety checks off */
  safety?: SafetyClassifier;
  prompts?: PromptBuilder;
  logger?: Logger;
}

type PipelineRun = AsyncGenerator<PipelineEvent, PipelineResult>;

export class Orchestrator {
  private readonly generator: Generator;
  private readonly retriever: Retriever;
  private readonly settings: PipelineSettings;
  private readonly safety: SafetyClassifier | undefined;
  private readonly prompts: PromptBuilder;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.generator = options.generator;
    this.retriever = options.retriever;
    this.settings = options.settings;
    this.safety = options.safety;
    this.prompts = options.prompts ?? new PromptBuilder();
    this.logger = options.logger ?? silentLogger;
  }

  get safetyEnabled(): boolean {
    return this.safety !== undefined;
  }

  /**
   * Answer a question.
   *
   * @throws PipelineError when any stage fails or the signal aborts
   */
  async ask(question: string, options: AskOptions = {}): Promise<PipelineResult> {
    const run = this.run(question, options, false);
    let step = await run.next();
    while (!step.done) {
      step = await run.next();
    }
    return step.value;
  }

  /**
   * Answer a question, reporting stages as they start.
   *
   * With safety checks off, generated text is yielded token by token. With
   * them on, nothing of the answer is released until the output check has
   * passed, so the only text is in the final `result` event.
   *
   * @throws PipelineError when any stage fails or the signal aborts
   */
  async *askStream(
    question: string,
    options: AskOptions = {}
  ): AsyncGenerator<PipelineEvent, void> {
    const result = yield* this.run(question, options, true);
    yield { type: 'result', result };
  }

  private async *run(question: string, options: AskOptions, streaming: boolean): PipelineRun {
    const started = Date.now();
    const { signal } = options;
    const safety = this.safety;

    if (safety) {
      yield { type: 'stage', stage: 'INPUT_CHECK' };
      const verdict = await this.runStage('INPUT_CHECK', signal, () =>
        safety.checkInput(question, signal)
      );
      if (!verdict.isSafe) {
        return this.refuse('input', verdict, started);
      }
    }

    yield { type: 'stage', stage: 'RETRIEVE' };
    const topK = options.topK ?? this.settings.topK;
    const retrieved = await this.runStage('RETRIEVE', signal, () =>
      this.retriever.search(question, topK, signal)
    );
    this.logger.debug?.(`Retrieved ${retrieved.length} of ${topK} chunks`);

    yield { type: 'stage', stage: 'PROMPT_BUILD' };
    const { request, sources } = await this.runStage('PROMPT_BUILD', signal, () =>
      this.buildRequest(question, retrieved, options)
    );

    yield { type: 'stage', stage: 'GENERATE' };
    let answer = '';
    if (streaming && !safety) {
      for await (const text of this.streamAnswer(request, signal)) {
        answer += text;
        yield { type: 'token', text };
      }
    } else {
      answer = await this.runStage('GENERATE', signal, () =>
        this.generator.generate(request, signal)
      );
    }

    if (safety) {
      yield { type: 'stage', stage: 'OUTPUT_CHECK' };
      const verdict = await this.runStage('OUTPUT_CHECK', signal, () =>
        safety.checkOutput(answer, signal)
      );
      if (!verdict.isSafe) {
        return this.refuse('output', verdict, started);
      }
    }

    yield { type: 'stage', stage: 'FORMAT' };
    const answerText = await this.runStage('FORMAT', signal, async () =>
      this.prompts.formatAnswer(answer, sources)
    );

    const durationMs = Date.now() - started;
    this.logger.debug?.(`Answered in ${durationMs}ms with ${sources.length} sources`);
    return { answerText, answer: answer.trim(), sources, durationMs };
  }

  private async buildRequest(
    question: string,
    retrieved: readonly DocumentChunk[],
    options: AskOptions
  ): Promise<{ request: GenerationRequest; sources: DocumentChunk[] }> {
    const systemPrompt = await this.prompts.loadSystemPrompt();
    const sources = this.fitContext(question, retrieved, systemPrompt);
    // 0 is indistinguishable from "not set"
    const temperature =
      options.temperature === undefined || options.temperature === 0
        ? this.settings.temperature
        : options.temperature;

    return {
      request: {
        prompt: this.prompts.buildGroundedPrompt(question, sources),
        systemPrompt,
        temperature,
        topP: this.settings.topP,
        maxTokens: this.settings.maxTokens,
        stopSequences: this.settings.stopSequences,
      },
      sources,
    };
  }

  /**
   * Drop the lowest-ranked chunks until system prompt, prompt and the
   * reserved answer tokens fit the context window. Dropped chunks are not
   * cited.
   */
  private fitContext(
    question: string,
    retrieved: readonly DocumentChunk[],
    systemPrompt: string
  ): DocumentChunk[] {
    const { contextWindow, maxTokens } = this.settings;
    let kept = [...retrieved];
    if (contextWindow === undefined) {
      return kept;
    }

    const budget = contextWindow - maxTokens - estimateTokens(systemPrompt);
    while (
      kept.length > 0 &&
      estimateTokens(this.prompts.buildGroundedPrompt(question, kept)) > budget
    ) {
      kept = kept.slice(0, -1);
    }

    if (kept.length < retrieved.length) {
      this.logger.debug?.(
        `Dropped ${retrieved.length - kept.length} of ${retrieved.length} chunks to fit the ${contextWindow}-token context window`
      );
    }
    return kept;
  }

  /**
   * Text of the streamed answer, in order. Stops at the done token and
   * throws the error a token carries.
   */
  private async *streamAnswer(
    request: GenerationRequest,
    signal: AbortSignal | undefined
  ): AsyncGenerator<string> {
    try {
      if (signal?.aborted) {
        throw BackendError.cancelled('query');
      }
      for await (const token of this.generator.generateStream(request, signal)) {
        if (signal?.aborted) {
          throw BackendError.cancelled(this.generator.name);
        }
        if (token.error) {
          throw token.error;
        }
        if (token.text) {
          yield token.text;
        }
        if (token.done) {
          return;
        }
      }
    } catch (error) {
      throw toPipelineError('GENERATE', error);
    }
  }

  private async runStage<T>(
    stage: PipelineStage,
    signal: AbortSignal | undefined,
    work: () => Promise<T>
  ): Promise<T> {
    try {
      if (signal?.aborted) {
        throw BackendError.cancelled('query');
      }
      return await work();
    } catch (error) {
      throw toPipelineError(stage, error);
    }
  }

  private refuse(
    blocked: 'input' | 'output',
    verdict: SafetyVerdict,
    started: number
  ): PipelineResult {
    const message = refusalMessage(verdict.category);
    this.logger.info?.(
      `Refused by the ${blocked} safety check` +
        (verdict.category ? ` (${verdict.category})` : verdict.reason ? `: ${verdict.reason}` : '')
    );
    return {
      answerText: message,
      answer: message,
      sources: [],
      blocked,
      category: verdict.category,
      durationMs: Date.now() - started,
    };
  }
}

function toPipelineError(stage: PipelineStage, error: unknown): PipelineError {
  return error instanceof PipelineError ? error : new PipelineError(stage, error);
}
