/**
 * Providers Module
 *
 * Generation backends behind the Generator contract.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createGenerator } from './providers/index.js';
 * const generator = createGenerator(config);
 * const answer = await generator.generate({ prompt: 'Hello' }, signal);
 * ```
 */

export type {
  BackendKind,
  BackendSpec,
  GenerationRequest,
  Generator,
  HealthStatus,
  StreamToken,
} from './types.js';

export { ChatGenerator, type ChatGeneratorOptions } from './chat.js';

export {
  backendSpecFromConfig,
  createGenerator,
  createGuardGenerator,
  type GeneratorFactoryOptions,
} from './llm.js';

export {
  probeBackend,
  probeOllama,
  probeLlamaCpp,
  probeOpenAICompatible,
  hasOllamaModel,
  HEALTH_TIMEOUT_MS,
} from './health.js';

export { apiRootFor, createClient, toBackendError, trimBaseUrl } from './client.js';

export {
  validateBackendUrl,
  BackendUrlSchema,
  SETUP_INSTRUCTIONS,
  type ValidationResult,
} from './validation.js';
