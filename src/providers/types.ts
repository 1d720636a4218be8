/**
 * Generation Backend Types
 *
 * Every backend (Ollama, llama.cpp server, OpenAI-compatible endpoint)
 * implements the same Generator contract. The safety classifier is a
 * Generator too, driven at temperature 0.
 */

/** Supported generation backends */
export type BackendKind = 'ollama' | 'llamacpp' | 'openai-compatible';

/**
 * Connection settings for one backend, as a discriminated union on `kind`.
 * Only the OpenAI-compatible variant carries a key.
 */
export type BackendSpec =
  | {
      kind: 'ollama';
      baseUrl: string;
      model: string;
      timeoutMs: number;
    }
  | {
      kind: 'llamacpp';
      baseUrl: string;
      model: string;
      timeoutMs: number;
    }
  | {
      kind: 'openai-compatible';
      baseUrl: string;
      model: string;
      timeoutMs: number;
      apiKey: string;
    };

/**
 * One completion call. Unset sampling fields fall back to the backend's own
 * defaults.
 */
export interface GenerationRequest {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  stopSequences?: string[];
}

/**
 * A streamed fragment. The last token has `done: true`; a failed stream ends
 * with a done token carrying `error`.
 */
export interface StreamToken {
  text: string;
  done: boolean;
  error?: Error;
}

/** Result of probing a dependency */
export interface HealthStatus {
  name: string;
  healthy: boolean;
  message: string;
  latencyMs: number;
}

export interface Generator {
  /** Display name, e.g. "ollama" */
  readonly name: string;
  readonly model: string;

  /** @throws BackendError */
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;

  /** Never throws; failures arrive as a final token with `error` */
  generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<StreamToken>;

  healthCheck(signal?: AbortSignal): Promise<HealthStatus>;
}
