/**
 * Stand-in for the `openai` package.
 *
 * @example
 * ```typescript
 * vi.mock('openai', () => import('../../test-utils/openai-mock.js'));
 *
 * openaiMock.chatCreate.mockResolvedValue(completionOf('Hello'));
 * ```
 */

import { vi } from 'vitest';

export interface FakeClientOptions {
  baseURL?: string;
  apiKey?: string;
  timeout?: number;
  maxRetries?: number;
}

export const openaiMock = {
  chatCreate: vi.fn(),
  embeddingsCreate: vi.fn(),
  clients: new Array<FakeClientOptions>(),
  reset(): void {
    this.chatCreate.mockReset();
    this.embeddingsCreate.mockReset();
    this.clients.length = 0;
  },
};

export class APIError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'APIError';
  }
}

export class APIConnectionError extends APIError {
  constructor(message = 'Connection error.') {
    super(message);
    this.name = 'APIConnectionError';
  }
}

export class APIUserAbortError extends APIError {
  constructor() {
    super('Request was aborted.');
    this.name = 'APIUserAbortError';
  }
}

export default class FakeOpenAI {
  static APIError = APIError;
  static APIConnectionError = APIConnectionError;
  static APIUserAbortError = APIUserAbortError;

  readonly chat = { completions: { create: openaiMock.chatCreate } };
  readonly embeddings = { create: openaiMock.embeddingsCreate };

  constructor(options: FakeClientOptions) {
    openaiMock.clients.push(options);
  }
}

/** A non-streaming chat completion */
export function completionOf(content: string | null): unknown {
  return { choices: [{ index: 0, message: { role: 'assistant', content } }] };
}

/** A chat completion stream yielding one chunk per fragment */
export async function* streamOf(fragments: string[]): AsyncGenerator<unknown> {
  for (const content of fragments) {
    yield { choices: [{ index: 0, delta: { content } }] };
  }
  yield { choices: [{ index: 0, delta: {}, finish_reason: 'stop' }] };
}

/** An embeddings response with the given vectors */
export function embeddingsOf(vectors: number[][]): unknown {
  return { data: vectors.map((embedding, index) => ({ object: 'embedding', index, embedding })) };
}
