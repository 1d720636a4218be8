/**
 * Prompt Module
 */

export {
  PromptBuilder,
  buildGroundedPrompt,
  formatAnswer,
  CONTEXT_PREAMBLE,
  GROUNDED_INSTRUCTIONS,
  UNGROUNDED_INSTRUCTIONS,
  DEFAULT_SYSTEM_PROMPT,
  type PromptBuilderOptions,
} from './builder.js';
