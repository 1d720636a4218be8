/**
 * Evaluation Runner
 *
 * Runs each case through the query pipeline in order and scores it.
 *
 * A case passes when the refusal expectation is met and, for a question
 * that should be answered, at least `minKeywordRatio` of its expected
 * keywords appear in the answer. A pipeline failure fails that case and the
 * run continues; cancellation stops the run.
 *
 * Uses dependency injection for testability: any object with an
 * Orchestrator-shaped `ask` will do.
 */

import { isCancellationError } from '../errors/index.js';
import type { AskOptions, PipelineResult } from '../agent/types.js';
import { matchKeywords, relevanceOf, summarize } from './metrics.js';
import type { EvalCase, EvalCaseResult, EvalReport } from './types.js';

export interface EvalPipeline {
  ask(question: string, options?: AskOptions): Promise<PipelineResult>;
}

export interface EvalRunOptions {
  /** Recorded in the report */
  testFile: string;
  /** @default 0.5 */
  minKeywordRatio?: number;
  signal?: AbortSignal;
  onCaseStart?: (index: number, total: number, question: string) => void;
  onCaseComplete?: (result: EvalCaseResult, index: number) => void;
}

export const DEFAULT_MIN_KEYWORD_RATIO = 0.5;

export function scoreCase(
  testCase: EvalCase,
  result: PipelineResult,
  responseTimeMs: number,
  minKeywordRatio = DEFAULT_MIN_KEYWORD_RATIO
): EvalCaseResult {
  const blocked = result.blocked !== undefined;
  const keywords = testCase.expected_keywords;
  const { found, missing } = matchKeywords(result.answer, keywords);
  const keywordHitRatio = keywords.length > 0 ? found.length / keywords.length : undefined;

  const passed = testCase.expect_refusal
    ? blocked
    : !blocked && (keywordHitRatio === undefined || keywordHitRatio >= minKeywordRatio);

  return {
    question: testCase.question,
    answer: result.answer,
    responseTimeMs,
    relevanceScore: relevanceOf(result.sources),
    sourceCount: result.sources.length,
    blocked,
    expectRefusal: testCase.expect_refusal,
    keywordsFound: found,
    keywordsMissing: missing,
    keywordHitRatio,
    passed,
  };
}

function failedCase(testCase: EvalCase, error: unknown): EvalCaseResult {
  return {
    question: testCase.question,
    answer: '',
    responseTimeMs: 0,
    relevanceScore: 0,
    sourceCount: 0,
    blocked: false,
    expectRefusal: testCase.expect_refusal,
    keywordsFound: [],
    keywordsMissing: [...testCase.expected_keywords],
    passed: false,
    error: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Evaluate every case, sequentially.
 *
 * @throws PipelineError when the run is cancelled
 */
export async function runEvaluation(
  pipeline: EvalPipeline,
  cases: readonly EvalCase[],
  options: EvalRunOptions
): Promise<EvalReport> {
  const { signal, onCaseStart, onCaseComplete } = options;
  const startedAt = new Date().toISOString();
  const results: EvalCaseResult[] = [];

  for (const [index, testCase] of cases.entries()) {
    onCaseStart?.(index, cases.length, testCase.question);

    const start = performance.now();
    let caseResult: EvalCaseResult;
    try {
      const result = await pipeline.ask(testCase.question, { signal });
      caseResult = scoreCase(
        testCase,
        result,
        Math.round(performance.now() - start),
        options.minKeywordRatio
      );
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      caseResult = failedCase(testCase, error);
    }

    results.push(caseResult);
    onCaseComplete?.(caseResult, index);
  }

  return { testFile: options.testFile, startedAt, summary: summarize(results), results };
}
