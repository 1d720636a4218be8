/**
 * Evaluation Test File Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { loadEvalCases, parseEvalCases, writeEvalReport } from '../dataset.js';
import type { EvalReport } from '../types.js';

describe('parseEvalCases', () => {
  it('reads one case per line and fills defaults', () => {
    const content =
      '{"question": "How do I deploy?", "expected_keywords": ["make"]}\n' +
      '\n' +
      '{"question": "bad stuff", "expect_refusal": true}\n';

    expect(parseEvalCases(content)).toEqual([
      { question: 'How do I deploy?', expected_keywords: ['make'], expect_refusal: false },
      { question: 'bad stuff', expected_keywords: [], expect_refusal: true },
    ]);
  });

  it('reports every invalid line', () => {
    const content = 'not json\n{"question": ""}\n{"question": "ok", "expected_keywords": "x"}';

    let caught: unknown;
    try {
      parseEvalCases(content, 'cases.jsonl');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Invalid cases.jsonl',
      issues: [
        'line 1: invalid JSON',
        'line 2: question: question must be a non-empty string',
        'line 3: expected_keywords: Expected array, received string',
      ],
    });
  });

  it('rejects a file without cases', () => {
    expect(() => parseEvalCases('\n\n')).toThrow('No test cases in test file');
  });
});

describe('loadEvalCases / writeEvalReport', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'docent-eval-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('fails for a missing file', () => {
    expect(() => loadEvalCases(join(dir, 'missing.jsonl'))).toThrow(FileNotFoundError);
  });

  it('writes the report as JSON, creating directories', () => {
    const report: EvalReport = {
      testFile: 'cases.jsonl',
      startedAt: '2026-01-01T00:00:00.000Z',
      summary: {
        total: 0,
        avgResponseTimeMs: 0,
        avgRelevanceScore: 0,
        safetyBlocks: 0,
        keywordHitRate: 0,
        passed: 0,
        failed: 0,
        errors: 0,
      },
      results: [],
    };
    const path = join(dir, 'out', 'report.json');

    writeEvalReport(path, report);

    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(report);
  });
});
