/**
 * Error type definitions for the docent CLI
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Stage and cause information for query pipeline failures
 */

/**
 * Base class for all CLI errors.
 *
 * `hint` tells the user how to recover; `code` becomes the process exit code
 * so scripts can branch on the failure kind.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values out of range (temperature, top_k, chunk sizes)
 * - A system prompt file that does not exist
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: docent config show  to see the active configuration', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is required by the selected backend but missing.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable or add it to ~/.docent/.env`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown for database-related errors.
 *
 * Wraps SQLite errors with user-friendly messages.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: docent health  to check the vector store', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Ingestion
// ============================================================================

export type ExtractionErrorCode = 'EXTRACTION_EMPTY' | 'EXTRACTION_FAILED';

/**
 * Thrown when text cannot be pulled out of a source document.
 *
 * Ingestion treats this as "skip the file", never as a fatal error.
 */
export class ExtractionError extends CLIError {
  public readonly errorCode: ExtractionErrorCode;
  public readonly path: string;
  public override readonly cause?: Error;

  constructor(errorCode: ExtractionErrorCode, path: string, message: string, cause?: Error) {
    super(message, 'The file was skipped; check that it contains readable text', 1);
    this.name = 'ExtractionError';
    this.errorCode = errorCode;
    this.path = path;
    this.cause = cause;
  }

  static empty(path: string): ExtractionError {
    return new ExtractionError(
      'EXTRACTION_EMPTY',
      path,
      `Document contains no extractable text: ${path}`
    );
  }

  static failed(path: string, cause: Error): ExtractionError {
    return new ExtractionError(
      'EXTRACTION_FAILED',
      path,
      `Failed to extract text from ${path}: ${cause.message}`,
      cause
    );
  }
}

// ============================================================================
// Backends
// ============================================================================

/**
 * - unavailable: the backend could not be reached (connection refused, DNS)
 * - request: the backend answered with an error
 * - cancelled: the caller's AbortSignal fired
 */
export type BackendErrorKind = 'unavailable' | 'request' | 'cancelled';

/**
 * Thrown by generation and embedding adapters.
 *
 * Exit code 6: Backend error
 */
export class BackendError extends CLIError {
  public readonly kind: BackendErrorKind;
  public readonly backend: string;
  public override readonly cause?: Error;

  constructor(kind: BackendErrorKind, backend: string, message: string, cause?: Error) {
    super(message, BackendError.hintFor(kind, backend), 6);
    this.name = 'BackendError';
    this.kind = kind;
    this.backend = backend;
    this.cause = cause;
  }

  static unavailable(backend: string, cause?: Error): BackendError {
    const detail = cause ? `: ${cause.message}` : '';
    return new BackendError('unavailable', backend, `${backend} is unavailable${detail}`, cause);
  }

  static request(backend: string, message: string, cause?: Error): BackendError {
    return new BackendError('request', backend, `${backend} request failed: ${message}`, cause);
  }

  static cancelled(backend: string): BackendError {
    return new BackendError('cancelled', backend, `${backend} request was cancelled`);
  }

  private static hintFor(kind: BackendErrorKind, backend: string): string | undefined {
    switch (kind) {
      case 'unavailable':
        return `Make sure ${backend} is running, then try: docent health`;
      case 'request':
        return 'Run with --verbose for more details';
      case 'cancelled':
        return undefined;
    }
  }
}

/**
 * Thrown when the vector store or query embedding fails during search.
 */
export class RetrievalError extends CLIError {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: docent health  to check the vector store', 5);
    this.name = 'RetrievalError';
    this.cause = cause;
  }
}

// ============================================================================
// Query pipeline
// ============================================================================

export type PipelineStage =
  | 'INPUT_CHECK'
  | 'RETRIEVE'
  | 'PROMPT_BUILD'
  | 'GENERATE'
  | 'OUTPUT_CHECK'
  | 'FORMAT';

/**
 * A query pipeline failure, tagged with the stage that failed.
 *
 * Exit code 7: Pipeline error
 */
export class PipelineError extends CLIError {
  public readonly stage: PipelineStage;
  public override readonly cause: unknown;

  constructor(stage: PipelineStage, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const hint = cause instanceof CLIError ? cause.hint : undefined;
    super(`Query failed at ${stage}: ${detail}`, hint, 7);
    this.name = 'PipelineError';
    this.stage = stage;
    this.cause = cause;
  }

  /** True when the failure was caused by the caller aborting the query */
  get isCancellation(): boolean {
    return isCancellationError(this.cause);
  }
}

/**
 * Recognises cancellation across the sources that produce it: our own
 * BackendError, DOMException AbortError from fetch, and the openai SDK's
 * APIUserAbortError.
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof BackendError) {
    return error.kind === 'cancelled';
  }
  if (error instanceof PipelineError) {
    return error.isCancellation;
  }
  if (error instanceof Error) {
    return error.name === 'AbortError' || error.name === 'APIUserAbortError';
  }
  return false;
}
