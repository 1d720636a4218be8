/**
 * ChatGenerator Tests
 *
 * The openai package is replaced by an in-process stand-in; no request
 * leaves the test.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('openai', () => import('../../test-utils/openai-mock.js'));

import {
  APIConnectionError,
  APIError,
  APIUserAbortError,
  completionOf,
  openaiMock,
  streamOf,
} from '../../test-utils/openai-mock.js';
import { BackendError } from '../../errors/index.js';
import { ChatGenerator } from '../chat.js';
import type { BackendSpec, StreamToken } from '../types.js';

const OLLAMA: BackendSpec = {
  kind: 'ollama',
  baseUrl: 'http://localhost:11434/',
  model: 'llama3.1:8b',
  timeoutMs: 30000,
};

async function collect(tokens: AsyncIterable<StreamToken>): Promise<StreamToken[]> {
  const out: StreamToken[] = [];
  for await (const token of tokens) {
    out.push(token);
  }
  return out;
}

describe('ChatGenerator', () => {
  beforeEach(() => {
    openaiMock.reset();
  });

  describe('client setup', () => {
    it('targets the /v1 API of local backends with a placeholder key', () => {
      new ChatGenerator(OLLAMA);
      new ChatGenerator({ ...OLLAMA, kind: 'llamacpp', baseUrl: 'http://localhost:8080' });

      expect(openaiMock.clients).toEqual([
        { baseURL: 'http://localhost:11434/v1', apiKey: 'local', timeout: 30000, maxRetries: 0 },
        { baseURL: 'http://localhost:8080/v1', apiKey: 'local', timeout: 30000, maxRetries: 0 },
      ]);
    });

    it('uses an OpenAI-compatible base URL as configured', () => {
      new ChatGenerator({
        kind: 'openai-compatible',
        baseUrl: 'https://llm.example.com/v1',
        model: 'gpt-test',
        timeoutMs: 1000,
        apiKey: 'test-secret',
      });

      expect(openaiMock.clients[0]).toEqual({
        baseURL: 'https://llm.example.com/v1',
        apiKey: 'test-secret',
        timeout: 1000,
        maxRetries: 0,
      });
    });

    it('names itself after the backend unless told otherwise', () => {
      expect(new ChatGenerator(OLLAMA).name).toBe('ollama');
      expect(new ChatGenerator(OLLAMA, { name: 'guard' }).name).toBe('guard');
    });
  });

  describe('generate', () => {
    it('sends system and user messages with sampling parameters', async () => {
      openaiMock.chatCreate.mockResolvedValue(completionOf('Paris'));
      const generator = new ChatGenerator(OLLAMA);

      const answer = await generator.generate({
        prompt: 'Capital of France?',
        systemPrompt: 'Be brief.',
        temperature: 0.2,
        topP: 0.9,
        maxTokens: 50,
        stopSequences: ['\n\n'],
      });

      expect(answer).toBe('Paris');
      expect(openaiMock.chatCreate).toHaveBeenCalledWith(
        {
          model: 'llama3.1:8b',
          messages: [
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'Capital of France?' },
          ],
          temperature: 0.2,
          top_p: 0.9,
          max_tokens: 50,
          stop: ['\n\n'],
          stream: false,
        },
        { signal: undefined }
      );
    });

    it('omits the system message and empty stop list', async () => {
      openaiMock.chatCreate.mockResolvedValue(completionOf('ok'));

      await new ChatGenerator(OLLAMA).generate({ prompt: 'hi', stopSequences: [] });

      const [params] = openaiMock.chatCreate.mock.calls[0] ?? [];
      expect(params).toMatchObject({ messages: [{ role: 'user', content: 'hi' }] });
      expect(params).toHaveProperty('stop', undefined);
    });

    it('returns an empty string for a null completion', async () => {
      openaiMock.chatCreate.mockResolvedValue(completionOf(null));
      await expect(new ChatGenerator(OLLAMA).generate({ prompt: 'hi' })).resolves.toBe('');
    });

    it('maps connection failures to unavailable', async () => {
      openaiMock.chatCreate.mockRejectedValue(new APIConnectionError());

      await expect(new ChatGenerator(OLLAMA).generate({ prompt: 'hi' })).rejects.toMatchObject({
        name: 'BackendError',
        kind: 'unavailable',
        message: 'ollama is unavailable: Connection error.',
      });
    });

    it('maps API errors to request failures', async () => {
      openaiMock.chatCreate.mockRejectedValue(new APIError('model not loaded', 500));

      await expect(new ChatGenerator(OLLAMA).generate({ prompt: 'hi' })).rejects.toMatchObject({
        kind: 'request',
        message: 'ollama request failed: model not loaded',
      });
    });

    it('maps an aborted call to cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      openaiMock.chatCreate.mockRejectedValue(new APIUserAbortError());

      const error = await new ChatGenerator(OLLAMA)
        .generate({ prompt: 'hi' }, controller.signal)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({ kind: 'cancelled', message: 'ollama request was cancelled' });
      expect(openaiMock.chatCreate).toHaveBeenCalledWith(expect.anything(), {
        signal: controller.signal,
      });
    });
  });

  describe('generateStream', () => {
    it('yields fragments then a done token', async () => {
      openaiMock.chatCreate.mockResolvedValue(streamOf(['Hel', 'lo']));

      const tokens = await collect(new ChatGenerator(OLLAMA).generateStream({ prompt: 'hi' }));

      expect(tokens).toEqual([
        { text: 'Hel', done: false },
        { text: 'lo', done: false },
        { text: '', done: true },
      ]);
      expect(openaiMock.chatCreate).toHaveBeenCalledWith(
        expect.objectContaining({ stream: true }),
        { signal: undefined }
      );
    });

    it('ends with an error token when the request fails', async () => {
      openaiMock.chatCreate.mockRejectedValue(new APIConnectionError());

      const tokens = await collect(new ChatGenerator(OLLAMA).generateStream({ prompt: 'hi' }));

      expect(tokens).toHaveLength(1);
      expect(tokens[0]?.done).toBe(true);
      expect(tokens[0]?.error).toMatchObject({ kind: 'unavailable' });
    });

    it('stops yielding text once cancellation is observed', async () => {
      openaiMock.chatCreate.mockResolvedValue(streamOf(['a', 'b', 'c']));
      const controller = new AbortController();

      const tokens: StreamToken[] = [];
      for await (const token of new ChatGenerator(OLLAMA).generateStream(
        { prompt: 'hi' },
        controller.signal
      )) {
        tokens.push(token);
        if (token.text === 'a') {
          controller.abort();
        }
      }

      expect(tokens.map((t) => t.text)).toEqual(['a', '']);
      expect(tokens[1]?.error).toMatchObject({ kind: 'cancelled' });
    });
  });
});
