/**
 * Chat-Completions Generator
 *
 * One Generator implementation for every backend kind. Requests go through
 * the OpenAI SDK against the backend's `/v1` API; cancellation is carried by
 * the caller's AbortSignal on every call.
 */

import type OpenAI from 'openai';

import { BackendError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { apiRootFor, createClient, toBackendError } from './client.js';
import { probeBackend } from './health.js';
import type {
  BackendSpec,
  GenerationRequest,
  Generator,
  HealthStatus,
  StreamToken,
} from './types.js';

type CompletionParams = Omit<OpenAI.Chat.ChatCompletionCreateParamsNonStreaming, 'stream'>;

export interface ChatGeneratorOptions {
  /** Display name; defaults to the backend kind */
  name?: string;
  logger?: Logger;
}

export class ChatGenerator implements Generator {
  readonly name: string;
  readonly model: string;

  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(
    private readonly spec: BackendSpec,
    options: ChatGeneratorOptions = {}
  ) {
    this.name = options.name ?? spec.kind;
    this.model = spec.model;
    this.logger = options.logger ?? silentLogger;
    this.client = createClient({
      baseUrl: apiRootFor(spec.kind, spec.baseUrl),
      timeoutMs: spec.timeoutMs,
      apiKey: spec.kind === 'openai-compatible' ? spec.apiKey : undefined,
    });
  }

  private buildParams(request: GenerationRequest): CompletionParams {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    return {
      model: this.model,
      messages,
      temperature: request.temperature,
      top_p: request.topP,
      max_tokens: request.maxTokens,
      stop: request.stopSequences && request.stopSequences.length > 0 ? request.stopSequences : undefined,
    };
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    this.logger.debug?.(`${this.name}: generate with ${this.model} (${request.prompt.length} chars)`);

    try {
      const completion = await this.client.chat.completions.create(
        { ...this.buildParams(request), stream: false },
        { signal }
      );
      return completion.choices[0]?.message.content ?? '';
    } catch (error) {
      throw toBackendError(this.name, error, signal);
    }
  }

  async *generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<StreamToken> {
    this.logger.debug?.(`${this.name}: stream with ${this.model} (${request.prompt.length} chars)`);

    try {
      const stream = await this.client.chat.completions.create(
        { ...this.buildParams(request), stream: true },
        { signal }
      );

      for await (const chunk of stream) {
        if (signal?.aborted) {
          break;
        }
        const text = chunk.choices[0]?.delta?.content;
        if (text) {
          yield { text, done: false };
        }
      }
    } catch (error) {
      yield { text: '', done: true, error: toBackendError(this.name, error, signal) };
      return;
    }

    if (signal?.aborted) {
      yield { text: '', done: true, error: BackendError.cancelled(this.name) };
      return;
    }
    yield { text: '', done: true };
  }

  healthCheck(signal?: AbortSignal): Promise<HealthStatus> {
    return probeBackend(this.name, this.spec, signal);
  }
}
