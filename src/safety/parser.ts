/**
 * Guard Response Parsing
 *
 * The guard model answers "safe", or "unsafe" followed by a category code.
 * Anything else is treated as unsafe.
 */

import { describeCategory } from './categories.js';
import type { SafetyVerdict } from './types.js';

export const UNPARSEABLE_REASON = 'Unable to determine safety classification';

const REFUSAL_PREFIX =
  "I can't provide assistance with that request as it may violate content safety guidelines";

const UNSAFE_PATTERN = /unsafe\s*([a-z]\d+)?/i;

/**
 * Turn a raw guard reply into a verdict.
 *
 * @example
 * ```typescript
 * parseSafetyResponse('unsafe\nS10');
 * // { isSafe: false, category: 'S10', reason: 'Hate' }
 * ```
 */
export function parseSafetyResponse(raw: string): SafetyVerdict {
  const response = raw.trim();

  if (response.toLowerCase() === 'safe') {
    return { isSafe: true };
  }

  const match = UNSAFE_PATTERN.exec(response);
  if (match) {
    const category = match[1]?.toUpperCase();
    if (category === undefined) {
      return { isSafe: false };
    }
    const reason = describeCategory(category);
    return reason === undefined ? { isSafe: false, category } : { isSafe: false, category, reason };
  }

  return { isSafe: false, reason: UNPARSEABLE_REASON };
}

/**
 * The message shown in place of an answer when a check fails. Names the
 * category only when the code is a known one.
 */
export function refusalMessage(category?: string): string {
  const description = category ? describeCategory(category) : undefined;
  if (category === undefined || description === undefined) {
    return `${REFUSAL_PREFIX}.`;
  }
  return `${REFUSAL_PREFIX} (category: ${category.toUpperCase()} - ${description}).`;
}
