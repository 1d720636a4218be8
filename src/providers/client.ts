/**
 * OpenAI SDK Client Wiring
 *
 * Ollama, the llama.cpp server and hosted endpoints all speak the OpenAI
 * chat-completions and embeddings API, so one SDK client covers every
 * backend. Ollama and llama.cpp serve it under `/v1`; an OpenAI-compatible
 * base URL is used as configured.
 */

import OpenAI from 'openai';

import { BackendError } from '../errors/index.js';

/** Ollama and llama.cpp ignore the key but the SDK requires one */
const LOCAL_API_KEY = 'local';

export interface ClientOptions {
  baseUrl: string;
  timeoutMs: number;
  apiKey?: string;
}

/**
 * Strip trailing slashes so paths can be appended with a single `/`.
 */
export function trimBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * The OpenAI API root for a backend.
 */
export function apiRootFor(kind: 'ollama' | 'llamacpp' | 'openai-compatible', baseUrl: string): string {
  const root = trimBaseUrl(baseUrl);
  return kind === 'openai-compatible' ? root : `${root}/v1`;
}

/**
 * Create an SDK client. Retries are disabled: a failed call surfaces at once.
 */
export function createClient(options: ClientOptions): OpenAI {
  return new OpenAI({
    baseURL: options.baseUrl,
    apiKey: options.apiKey ?? LOCAL_API_KEY,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
}

/**
 * Map an SDK or network failure to a BackendError.
 *
 * An aborted caller signal always maps to `cancelled`, whatever the SDK
 * threw; connection failures and timeouts map to `unavailable`.
 */
export function toBackendError(backend: string, error: unknown, signal?: AbortSignal): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) {
    return BackendError.cancelled(backend);
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  if (error instanceof OpenAI.APIConnectionError) {
    return BackendError.unavailable(backend, cause);
  }
  return BackendError.request(backend, cause.message, cause);
}
