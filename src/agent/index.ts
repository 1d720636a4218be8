/**
 * Agent Module
 *
 * The query pipeline: safety checks, retrieval, prompting, generation and
 * citation formatting.
 */

export { Orchestrator, type OrchestratorOptions } from './orchestrator.js';
export {
  createPipeline,
  checkHealth,
  openConfiguredDb,
  settingsFromConfig,
  SAFETY_DISABLED_STATUS,
  type CreatePipelineOptions,
  type Pipeline,
} from './factory.js';
export type {
  AskOptions,
  PipelineEvent,
  PipelineResult,
  PipelineSettings,
} from './types.js';
