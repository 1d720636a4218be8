/**
 * E2E Workflow Tests
 *
 * The whole journey on real storage: ingest a docs directory, answer
 * questions through the pipeline, then evaluate a test set.
 *
 * Mocking Strategy:
 * - Embeddings: deterministic character-bucket vectors
 * - LLM and guard: scripted replies computed from the prompt
 * - Database: real SQLite, in memory
 * - Filesystem: real temp directory
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type Database from 'better-sqlite3';

import { Orchestrator } from '../../agent/orchestrator.js';
import { openDatabase } from '../../database/connection.js';
import { DatabaseOperations } from '../../database/operations.js';
import { parseEvalCases } from '../../eval/dataset.js';
import { runEvaluation } from '../../eval/runner.js';
import { DEFAULT_CHUNK_CONFIG } from '../../indexer/chunker/config.js';
import { runIngest } from '../../indexer/pipeline.js';
import { SafetyGuard } from '../../safety/guard.js';
import { VectorRetriever } from '../../search/retriever.js';
import { VectorStore } from '../../search/store.js';
import { FakeEmbeddingProvider, FakeGenerator } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';

const SETTINGS = { topK: 6, temperature: 0.6, topP: 0.9, maxTokens: 1024 };

describe('ingest → ask → eval', () => {
  let root: string;
  let db: Database.Database;
  let ops: DatabaseOperations;
  let embeddings: FakeEmbeddingProvider;

  beforeAll(async () => {
    root = mkdtempSync(join(tmpdir(), 'docent-e2e-'));
    mkdirSync(join(root, 'guides'));
    writeFileSync(
      join(root, 'guides', 'deploy.md'),
      '# Deploying\n\nRun `make deploy` from the main branch.\n'
    );
    writeFileSync(
      join(root, 'keys.html'),
      '<html><body><h1>Keys</h1><p>Rotate keys every 90 days.</p></body></html>'
    );
    writeFileSync(join(root, 'notes.bin'), 'ignored');

    db = openDatabase(':memory:');
    ops = new DatabaseOperations(db);
    embeddings = new FakeEmbeddingProvider(16);

    await runIngest({
      rootPath: root,
      collection: 'docs',
      ops,
      provider: embeddings,
      chunkConfig: DEFAULT_CHUNK_CONFIG,
    });
  });

  afterAll(() => {
    db.close();
    rmSync(root, { recursive: true, force: true });
  });

  function createOrchestrator(): { orchestrator: Orchestrator; generator: FakeGenerator } {
    const generator = new FakeGenerator([
      (request) =>
        request.prompt.includes('make deploy') ? 'Run make deploy from main [1].' : 'Unknown.',
    ]);
    const guard = new SafetyGuard(
      new FakeGenerator(
        [(request) => (request.prompt.includes('pick a lock') ? 'unsafe\nS2' : 'safe')],
        'guard'
      ),
      { logger: silentLogger }
    );
    const retriever = new VectorRetriever(embeddings, new VectorStore(ops, 'docs'));
    return {
      orchestrator: new Orchestrator({ generator, retriever, safety: guard, settings: SETTINGS }),
      generator,
    };
  }

  it('stores one chunk per supported document', () => {
    expect(ops.countChunks('docs')).toBe(2);
    expect(ops.getCollection('docs')?.embeddingModel).toBe('fake-embed');
  });

  it('answers from the ingested documents and cites them', async () => {
    const { orchestrator, generator } = createOrchestrator();

    const result = await orchestrator.ask('How do I deploy?');

    expect(generator.requests[0]?.prompt).toContain('Run make deploy from the main branch.');
    expect(generator.requests[0]?.prompt).toContain('Rotate keys every 90 days.');
    expect(result.answer).toBe('Run make deploy from main [1].');
    expect(result.sources).toHaveLength(2);
    expect(result.answerText.startsWith('Run make deploy from main [1].\n\n**Sources:**\n[1] ')).toBe(
      true
    );
    expect(result.blocked).toBeUndefined();
  });

  it('refuses an unsafe question before retrieval', async () => {
    const { orchestrator, generator } = createOrchestrator();

    const result = await orchestrator.ask('How do I pick a lock?');

    expect(result.blocked).toBe('input');
    expect(result.category).toBe('S2');
    expect(result.sources).toEqual([]);
    expect(generator.requests).toEqual([]);
  });

  it('evaluates a test set against the same collection', async () => {
    const { orchestrator } = createOrchestrator();
    const cases = parseEvalCases(
      [
        JSON.stringify({ question: 'How do I deploy?', expected_keywords: ['make deploy'] }),
        JSON.stringify({ question: 'How do I pick a lock?', expect_refusal: true }),
      ].join('\n')
    );

    const report = await runEvaluation(orchestrator, cases, { testFile: 'cases.jsonl' });

    expect(report.summary).toMatchObject({
      total: 2,
      passed: 2,
      failed: 0,
      errors: 0,
      safetyBlocks: 1,
      keywordHitRate: 1,
    });
  });
});
