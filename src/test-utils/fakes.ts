/**
 * In-process fakes for Generator, Retriever and EmbeddingProvider.
 * Each records what it was asked so tests can assert on it.
 */

import { BackendError } from '../errors/index.js';
import type { DocumentChunk } from '../indexer/chunker/types.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type {
  GenerationRequest,
  Generator,
  HealthStatus,
  StreamToken,
} from '../providers/types.js';
import type { Retriever } from '../search/types.js';

/** A canned reply: text, a failure, or text computed from the request */
export type FakeReply = string | Error | ((request: GenerationRequest) => string);

export class FakeGenerator implements Generator {
  readonly requests: GenerationRequest[] = [];
  private readonly replies: FakeReply[];

  constructor(
    replies: FakeReply[] = [],
    readonly name = 'fake',
    readonly model = 'fake-model',
    private readonly health: Partial<HealthStatus> = {}
  ) {
    this.replies = [...replies];
  }

  /** Replies are used in order; the last one repeats */
  private nextReply(request: GenerationRequest): string | Error {
    this.requests.push(request);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      return '';
    }
    return typeof reply === 'function' ? reply(request) : reply;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw BackendError.cancelled(this.name);
    }
    const reply = this.nextReply(request);
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  /** Streams the reply word by word, keeping the whitespace */
  async *generateStream(
    request: GenerationRequest,
    signal?: AbortSignal
  ): AsyncIterable<StreamToken> {
    const reply = this.nextReply(request);
    if (reply instanceof Error) {
      yield { text: '', done: true, error: reply };
      return;
    }

    for (const text of reply.split(/(?<=\s)/)) {
      if (signal?.aborted) {
        yield { text: '', done: true, error: BackendError.cancelled(this.name) };
        return;
      }
      if (text) {
        yield { text, done: false };
      }
    }
    yield { text: '', done: true };
  }

  async healthCheck(): Promise<HealthStatus> {
    return { name: this.name, healthy: true, message: 'ok', latencyMs: 1, ...this.health };
  }
}

export class FakeRetriever implements Retriever {
  readonly calls: Array<{ query: string; topK: number }> = [];

  constructor(private readonly result: DocumentChunk[] | Error = []) {}

  async search(query: string, topK: number, signal?: AbortSignal): Promise<DocumentChunk[]> {
    this.calls.push({ query, topK });
    if (signal?.aborted) {
      throw BackendError.cancelled('retriever');
    }
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result.slice(0, topK);
  }

  async healthCheck(): Promise<HealthStatus> {
    return { name: 'retriever', healthy: true, message: 'ok', latencyMs: 1 };
  }
}

/**
 * Deterministic bag-of-characters vector: each character adds 1 to the
 * bucket `charCode % dimensions`.
 */
export function textVector(text: string, dimensions: number): Float32Array {
  const vector = new Float32Array(dimensions);
  for (const char of text) {
    const bucket = (char.codePointAt(0) ?? 0) % dimensions;
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fake embeddings';
  readonly model = 'fake-embed';
  readonly batches: string[][] = [];

  constructor(
    readonly dimensions = 8,
    private readonly fail: (texts: string[]) => Error | undefined = () => undefined
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    this.batches.push(texts);
    if (signal?.aborted) {
      throw BackendError.cancelled(this.name);
    }
    const failure = this.fail(texts);
    if (failure) {
      throw failure;
    }
    return texts.map((text) => textVector(text, this.dimensions));
  }

  async healthCheck(): Promise<HealthStatus> {
    return { name: this.name, healthy: true, message: 'ok', latencyMs: 1 };
  }
}

export function makeChunk(overrides: Partial<DocumentChunk> = {}): DocumentChunk {
  return {
    id: 'chunk-0',
    content: 'Deploys run from the main branch.',
    metadata: {},
    sourcePath: '/docs/deploy.md',
    sourceTitle: 'Deploy',
    sourceType: 'markdown',
    chunkIndex: 0,
    totalChunks: 1,
    score: 0.9,
    ...overrides,
  };
}
