/**
 * Prompt Builder
 *
 * Renders the grounded prompt sent to the generator, the cited answer shown
 * to the user, and the system prompt.
 *
 * PROMPT LAYOUT (with context):
 * ```
 * Based on the following context from the documentation:
 *
 * ### Source 1 - Deploy:
 * <chunk content>
 *
 * ---
 *
 * Question: <query>
 *
 * <grounding instructions>
 * ```
 */

import { readFile } from 'node:fs/promises';

import { ConfigError } from '../errors/index.js';
import type { DocumentChunk } from '../indexer/chunker/types.js';

export const CONTEXT_PREAMBLE = 'Based on the following context from the documentation:\n\n';

export const GROUNDED_INSTRUCTIONS =
  'Please answer the question based on the provided context. ' +
  "If the context doesn't contain relevant information, say so clearly. " +
  'Be specific and reference the sources when possible.';

export const UNGROUNDED_INSTRUCTIONS =
  'Please answer this question clearly and practically. ' +
  "If you're not sure about something, say so.";

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant that answers questions about a team's internal documentation: runbooks, onboarding guides, design notes and operational procedures.

Guidelines:
- Ground your answers in the documentation excerpts you are given
- Give clear, step-by-step instructions when possible
- Include relevant commands, file paths and configuration examples
- Mention risks before destructive operations
- If you're not certain about something, say so clearly
- Reference the numbered sources you relied on

Be concise, prioritise actionable information and suggest next steps where relevant.`;

/** Title, then path; empty when the chunk has neither */
function sourceLabel(chunk: DocumentChunk): string {
  return chunk.sourceTitle || chunk.sourcePath;
}

/**
 * Build the user prompt for a query and its retrieved context, in order.
 */
export function buildGroundedPrompt(query: string, context: readonly DocumentChunk[]): string {
  let prompt = '';

  if (context.length > 0) {
    prompt += CONTEXT_PREAMBLE;
    context.forEach((chunk, i) => {
      const label = sourceLabel(chunk);
      prompt += `### Source ${i + 1}${label ? ` - ${label}` : ''}:\n`;
      prompt += `${chunk.content}\n\n`;
    });
    prompt += '---\n\n';
  }

  prompt += `Question: ${query}\n\n`;
  prompt += context.length > 0 ? GROUNDED_INSTRUCTIONS : UNGROUNDED_INSTRUCTIONS;
  return prompt;
}

/**
 * Append a numbered source list to an answer.
 *
 * @example
 * ```typescript
 * formatAnswer('Run make deploy.', [chunk]);
 * // 'Run make deploy.\n\n**Sources:**\n[1] Deploy (relevance: 90.0%)\n'
 * ```
 */
export function formatAnswer(answer: string, sources: readonly DocumentChunk[]): string {
  const trimmed = answer.trim();
  if (sources.length === 0) {
    return trimmed;
  }

  let formatted = `${trimmed}\n\n**Sources:**\n`;
  sources.forEach((source, i) => {
    formatted += `[${i + 1}] ${sourceLabel(source) || `Document ${source.id}`}`;
    if (source.score !== undefined && source.score > 0) {
      formatted += ` (relevance: ${(source.score * 100).toFixed(1)}%)`;
    }
    formatted += '\n';
  });
  return formatted;
}

export interface PromptBuilderOptions {
  /** File holding the system prompt; the built-in prompt is used when unset */
  systemPromptFile?: string;
}

export class PromptBuilder {
  private systemPrompt: Promise<string> | undefined;

  constructor(private readonly options: PromptBuilderOptions = {}) {}

  buildGroundedPrompt(query: string, context: readonly DocumentChunk[]): string {
    return buildGroundedPrompt(query, context);
  }

  formatAnswer(answer: string, sources: readonly DocumentChunk[]): string {
    return formatAnswer(answer, sources);
  }

  /**
   * The system prompt, read once per builder. Concurrent first calls share
   * the same read; a failed read is not cached.
   *
   * @throws ConfigError when the configured file cannot be read
   */
  loadSystemPrompt(): Promise<string> {
    if (this.systemPrompt === undefined) {
      const loading = this.readSystemPrompt();
      this.systemPrompt = loading;
      loading.catch(() => {
        if (this.systemPrompt === loading) {
          this.systemPrompt = undefined;
        }
      });
    }
    return this.systemPrompt;
  }

  private async readSystemPrompt(): Promise<string> {
    const file = this.options.systemPromptFile;
    if (file === undefined) {
      return DEFAULT_SYSTEM_PROMPT;
    }
    try {
      return await readFile(file, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(
        `Failed to read system prompt file ${file}: ${reason}`,
        'Fix llm.system_prompt_file in your config, or remove it to use the built-in prompt'
      );
    }
  }
}
