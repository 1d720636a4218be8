/**
 * Evaluation Metrics
 *
 * Pure functions over answers and case results.
 */

import type { DocumentChunk } from '../indexer/chunker/types.js';
import type { EvalCaseResult, EvalSummary } from './types.js';

/** Arithmetic mean; 0 for an empty list */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Split expected keywords into those the answer contains and those it
 * does not. Matching is case-insensitive substring search.
 */
export function matchKeywords(
  answer: string,
  keywords: readonly string[]
): { found: string[]; missing: string[] } {
  const haystack = answer.toLowerCase();
  const found: string[] = [];
  const missing: string[] = [];
  for (const keyword of keywords) {
    (haystack.includes(keyword.toLowerCase()) ? found : missing).push(keyword);
  }
  return { found, missing };
}

/** Mean source score, treating an unscored source as 0 */
export function relevanceOf(sources: readonly DocumentChunk[]): number {
  return mean(sources.map((source) => source.score ?? 0));
}

export function summarize(results: readonly EvalCaseResult[]): EvalSummary {
  const completed = results.filter((r) => r.error === undefined);
  const cited = completed.filter((r) => r.sourceCount > 0);
  const ratios = completed.flatMap((r) =>
    r.keywordHitRatio === undefined ? [] : [r.keywordHitRatio]
  );
  const passed = results.filter((r) => r.passed).length;

  return {
    total: results.length,
    avgResponseTimeMs: mean(completed.map((r) => r.responseTimeMs)),
    avgRelevanceScore: mean(cited.map((r) => r.relevanceScore)),
    safetyBlocks: completed.filter((r) => r.blocked).length,
    keywordHitRate: mean(ratios),
    passed,
    failed: results.length - passed,
    errors: results.length - completed.length,
  };
}
