/**
 * Evaluation Module
 */

export { EvalCaseSchema } from './types.js';
export type { EvalCase, EvalCaseResult, EvalReport, EvalSummary } from './types.js';
export { parseEvalCases, loadEvalCases, writeEvalReport } from './dataset.js';
export { mean, matchKeywords, relevanceOf, summarize } from './metrics.js';
export {
  runEvaluation,
  scoreCase,
  DEFAULT_MIN_KEYWORD_RATIO,
  type EvalPipeline,
  type EvalRunOptions,
} from './runner.js';
