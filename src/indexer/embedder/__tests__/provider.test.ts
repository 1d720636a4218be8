/**
 * Embedding Provider Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('openai', () => import('../../../test-utils/openai-mock.js'));

import { APIConnectionError, embeddingsOf, openaiMock } from '../../../test-utils/openai-mock.js';
import { DEFAULT_CONFIG, type Config } from '../../../config/index.js';
import { ConfigError } from '../../../errors/index.js';
import { embeddingSpecFromConfig, OpenAIEmbeddingProvider } from '../provider.js';

const SPEC = {
  kind: 'ollama' as const,
  baseUrl: 'http://localhost:11434',
  model: 'nomic-embed-text',
  dimensions: 3,
  timeoutMs: 5000,
};

describe('OpenAIEmbeddingProvider', () => {
  beforeEach(() => {
    openaiMock.reset();
  });

  it('requests float embeddings from the /v1 API', async () => {
    openaiMock.embeddingsCreate.mockResolvedValue(embeddingsOf([[1, 0, 0]]));
    const provider = new OpenAIEmbeddingProvider(SPEC);

    const [vector] = await provider.embed(['hello']);

    expect(vector).toEqual(new Float32Array([1, 0, 0]));
    expect(openaiMock.clients[0]?.baseURL).toBe('http://localhost:11434/v1');
    expect(openaiMock.embeddingsCreate).toHaveBeenCalledWith(
      { model: 'nomic-embed-text', input: ['hello'], encoding_format: 'float' },
      { signal: undefined }
    );
  });

  it('orders vectors by their index', async () => {
    openaiMock.embeddingsCreate.mockResolvedValue({
      data: [
        { object: 'embedding', index: 1, embedding: [0, 1, 0] },
        { object: 'embedding', index: 0, embedding: [1, 0, 0] },
      ],
    });

    const vectors = await new OpenAIEmbeddingProvider(SPEC).embed(['first', 'second']);

    expect(vectors).toEqual([new Float32Array([1, 0, 0]), new Float32Array([0, 1, 0])]);
  });

  it('skips the request for no texts', async () => {
    await expect(new OpenAIEmbeddingProvider(SPEC).embed([])).resolves.toEqual([]);
    expect(openaiMock.embeddingsCreate).not.toHaveBeenCalled();
  });

  it('rejects vectors of the wrong size', async () => {
    openaiMock.embeddingsCreate.mockResolvedValue(embeddingsOf([[1, 0]]));

    await expect(new OpenAIEmbeddingProvider(SPEC).embed(['x'])).rejects.toMatchObject({
      kind: 'request',
      message:
        'embeddings request failed: expected 3-dimensional embeddings from nomic-embed-text, got 2 (check embedding.dimensions)',
    });
  });

  it('reports an unreachable server as unavailable', async () => {
    openaiMock.embeddingsCreate.mockRejectedValue(new APIConnectionError());

    await expect(new OpenAIEmbeddingProvider(SPEC).embed(['x'])).rejects.toMatchObject({
      kind: 'unavailable',
      backend: 'embeddings',
    });
  });
});

describe('embeddingSpecFromConfig', () => {
  it('uses the Ollama URL by default', () => {
    expect(embeddingSpecFromConfig(DEFAULT_CONFIG)).toEqual({
      kind: 'ollama',
      baseUrl: 'http://localhost:11434',
      model: 'nomic-embed-text',
      dimensions: 768,
      timeoutMs: 120000,
    });
  });

  it('requires a base URL for OpenAI-compatible embeddings', () => {
    const config: Config = {
      ...DEFAULT_CONFIG,
      embedding: { ...DEFAULT_CONFIG.embedding, provider: 'openai-compatible' },
    };

    expect(() => embeddingSpecFromConfig(config)).toThrow(ConfigError);
  });
});
