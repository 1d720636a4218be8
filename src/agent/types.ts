/**
 * Query Pipeline Types
 *
 * A question moves through fixed stages:
 *
 * ```
 * INPUT_CHECK → RETRIEVE → PROMPT_BUILD → GENERATE → OUTPUT_CHECK → FORMAT
 *      │                                                  │
 *      └──────────── unsafe: refusal, no sources ─────────┘
 * ```
 *
 * Any stage may fail with a PipelineError naming the stage.
 */

import type { PipelineStage } from '../errors/index.js';
import type { DocumentChunk } from '../indexer/chunker/types.js';

export type { PipelineStage };

/**
 * Generation parameters taken from `[llm]` and `[search]`.
 */
export interface PipelineSettings {
  topK: number;
  temperature: number;
  topP: number;
  maxTokens: number;
  /** Model context window in tokens; retrieved context is trimmed to fit */
  contextWindow?: number;
  stopSequences?: string[];
}

/**
 * Per-question overrides.
 */
export interface AskOptions {
  /**
   * Sampling temperature for this question. 0 (or unset) means the
   * configured default; there is no way to ask for exactly 0 here.
   */
  temperature?: number;
  /** Chunks to retrieve; the configured top_k when unset */
  topK?: number;
  /** Aborts whichever stage is running */
  signal?: AbortSignal;
}

export interface PipelineResult {
  /** Answer with its source list appended, or the refusal message */
  answerText: string;
  /** Generated text without citations, or the refusal message */
  answer: string;
  /** Chunks the answer was grounded on; empty when blocked */
  sources: DocumentChunk[];
  /** Set when a safety check refused the question or the answer */
  blocked?: 'input' | 'output';
  /** Safety category code of the refusal, when the guard named one */
  category?: string;
  durationMs: number;
}

/**
 * Events yielded by Orchestrator.askStream().
 */
export type PipelineEvent =
  | {
      /** A stage is starting */
      type: 'stage';
      stage: PipelineStage;
    }
  | {
      /** Generated text, in order. Only emitted while safety checks are off */
      type: 'token';
      text: string;
    }
  | {
      /** Final outcome; always the last event */
      type: 'result';
      result: PipelineResult;
    };
