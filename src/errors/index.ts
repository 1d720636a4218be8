/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: docent config show');
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  ExtractionError,
  BackendError,
  RetrievalError,
  PipelineError,
  isCancellationError,
  type ExtractionErrorCode,
  type BackendErrorKind,
  type PipelineStage,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  CANCELLED_EXIT_CODE,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
