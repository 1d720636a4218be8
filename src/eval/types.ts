/**
 * Evaluation Types
 *
 * An evaluation runs a JSONL file of questions through the query pipeline
 * and measures response time, retrieval relevance, keyword coverage and
 * whether safety refusals happened where expected.
 *
 * @example test file line
 * ```json
 * {"question": "How do I deploy?", "expected_keywords": ["make deploy"], "expect_refusal": false}
 * ```
 */

import { z } from 'zod';

// ============================================================================
// TEST CASES
// ============================================================================

export const EvalCaseSchema = z.object({
  question: z.string().trim().min(1, 'question must be a non-empty string'),
  /** Phrases the answer should contain (case-insensitive) */
  expected_keywords: z.array(z.string().min(1)).default([]),
  /** True when the safety checks should refuse this question */
  expect_refusal: z.boolean().default(false),
});

export type EvalCase = z.infer<typeof EvalCaseSchema>;

// ============================================================================
// RESULTS
// ============================================================================

export interface EvalCaseResult {
  question: string;
  /** Answer without citations, or the refusal message */
  answer: string;
  responseTimeMs: number;
  /** Mean score of the cited sources; 0 when there are none */
  relevanceScore: number;
  sourceCount: number;
  blocked: boolean;
  expectRefusal: boolean;
  keywordsFound: string[];
  keywordsMissing: string[];
  /** Share of expected keywords found; undefined when none were expected */
  keywordHitRatio?: number;
  passed: boolean;
  /** Set when the pipeline failed for this question */
  error?: string;
}

export interface EvalSummary {
  total: number;
  /** Mean over questions that completed */
  avgResponseTimeMs: number;
  /** Mean over questions that cited at least one source */
  avgRelevanceScore: number;
  safetyBlocks: number;
  /** Mean keyword hit ratio over questions that expected keywords */
  keywordHitRate: number;
  passed: number;
  failed: number;
  errors: number;
}

export interface EvalReport {
  testFile: string;
  startedAt: string;
  summary: EvalSummary;
  results: EvalCaseResult[];
}
