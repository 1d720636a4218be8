/**
 * VectorRetriever Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';

import { openDatabase } from '../../database/connection.js';
import { DatabaseOperations } from '../../database/operations.js';
import { BackendError, RetrievalError } from '../../errors/index.js';
import { FakeEmbeddingProvider, makeChunk, textVector } from '../../test-utils/index.js';
import { VectorRetriever } from '../retriever.js';
import { VectorStore } from '../store.js';

const DIMS = 16;

describe('VectorRetriever', () => {
  let db: Database.Database;
  let store: VectorStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    const ops = new DatabaseOperations(db);
    ops.ensureCollection('docs', 'fake-embed', DIMS);
    store = new VectorStore(ops, 'docs');
    store.upsert(
      ['deploy the service', 'rotate the keys'].map((content, i) => ({
        ...makeChunk({ id: `c${i}`, content }),
        embedding: textVector(content, DIMS),
      }))
    );
  });

  afterEach(() => {
    db.close();
  });

  it('embeds the query and returns the closest chunk first', async () => {
    const provider = new FakeEmbeddingProvider(DIMS);
    const retriever = new VectorRetriever(provider, store);

    const results = await retriever.search('deploy the service', 1);

    expect(provider.batches).toEqual([['deploy the service']]);
    expect(results.map((r) => r.id)).toEqual(['c0']);
    expect(results[0]?.score).toBeCloseTo(1);
  });

  it('wraps provider failures in RetrievalError', async () => {
    const provider = new FakeEmbeddingProvider(DIMS, () => new Error('boom'));

    const error = await new VectorRetriever(provider, store).search('q', 3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({ message: 'Search failed: boom', code: 5 });
  });

  it('lets cancellation through unchanged', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await new VectorRetriever(new FakeEmbeddingProvider(DIMS), store)
      .search('q', 3, controller.signal)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ kind: 'cancelled' });
  });

  it('reports the store status when everything is up', async () => {
    const status = await new VectorRetriever(new FakeEmbeddingProvider(DIMS), store).healthCheck();

    expect(status).toMatchObject({ name: 'retriever', healthy: true, message: '2 chunks in "docs"' });
  });
});
