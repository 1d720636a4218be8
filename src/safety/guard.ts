/**
 * Safety Guard
 *
 * Screens questions and answers with a guard model (Llama Guard 3 by
 * default) served by the same backend kinds as generation. Requests are
 * deterministic (temperature 0) and short; the reply is parsed with
 * parseSafetyResponse.
 *
 * @example
 * ```typescript
 * const guard = new SafetyGuard(createGuardGenerator(config));
 * const verdict = await guard.checkInput('How do I reset my password?');
 * if (!verdict.isSafe) console.log(refusalMessage(verdict.category));
 * ```
 */

import type { Generator, HealthStatus } from '../providers/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { formatCategoryList } from './categories.js';
import { parseSafetyResponse, UNPARSEABLE_REASON } from './parser.js';
import type { SafetyClassifier, SafetyVerdict } from './types.js';

/** Guard replies are a verdict line and a category line */
export const GUARD_MAX_TOKENS = 100;

export interface SafetyGuardOptions {
  logger?: Logger;
}

function classificationPrompt(subject: 'User' | 'Agent', conversation: string): string {
  return [
    `Task: Check if there is unsafe content in '${subject}' messages in conversations according to our safety policy with the below categories.`,
    '',
    '<BEGIN UNSAFE CONTENT CATEGORIES>',
    formatCategoryList(),
    '<END UNSAFE CONTENT CATEGORIES>',
    '',
    '<BEGIN CONVERSATION>',
    '',
    conversation,
    '',
    '<END CONVERSATION>',
    '',
    `Provide your safety assessment for ONLY THE LAST ${subject} message in the above conversation:`,
    "- First line must read 'safe' or 'unsafe'.",
    '- If unsafe, a second line must include a comma-separated list of violated categories.',
  ].join('\n');
}

export function buildInputPrompt(question: string): string {
  return classificationPrompt('User', `User: ${question}`);
}

export function buildOutputPrompt(answer: string): string {
  return classificationPrompt('Agent', `Agent: ${answer}`);
}

export class SafetyGuard implements SafetyClassifier {
  private readonly logger: Logger;

  constructor(
    private readonly generator: Generator,
    options: SafetyGuardOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
  }

  checkInput(text: string, signal?: AbortSignal): Promise<SafetyVerdict> {
    return this.classify(buildInputPrompt(text), signal);
  }

  checkOutput(text: string, signal?: AbortSignal): Promise<SafetyVerdict> {
    return this.classify(buildOutputPrompt(text), signal);
  }

  healthCheck(signal?: AbortSignal): Promise<HealthStatus> {
    return this.generator.healthCheck(signal);
  }

  private async classify(prompt: string, signal?: AbortSignal): Promise<SafetyVerdict> {
    const raw = await this.generator.generate(
      { prompt, temperature: 0, maxTokens: GUARD_MAX_TOKENS },
      signal
    );
    const verdict = parseSafetyResponse(raw);
    if (verdict.reason === UNPARSEABLE_REASON) {
      this.logger.warn(`Unrecognised guard reply from ${this.generator.model}: ${raw.trim()}`);
    }
    return verdict;
  }
}
