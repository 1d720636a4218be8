/**
 * Safety Module
 *
 * Guard-model screening of questions and answers.
 */

export { SAFETY_CATEGORIES, describeCategory, formatCategoryList } from './categories.js';
export { parseSafetyResponse, refusalMessage, UNPARSEABLE_REASON } from './parser.js';
export {
  SafetyGuard,
  buildInputPrompt,
  buildOutputPrompt,
  GUARD_MAX_TOKENS,
  type SafetyGuardOptions,
} from './guard.js';
export type { SafetyClassifier, SafetyVerdict } from './types.js';
