/**
 * Prompt Builder Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '../../errors/index.js';
import { makeChunk } from '../../test-utils/index.js';
import {
  buildGroundedPrompt,
  DEFAULT_SYSTEM_PROMPT,
  formatAnswer,
  GROUNDED_INSTRUCTIONS,
  PromptBuilder,
  UNGROUNDED_INSTRUCTIONS,
} from '../builder.js';

describe('buildGroundedPrompt', () => {
  it('lists sources in order before the question', () => {
    const context = [
      makeChunk({ content: 'Deploys run from main.' }),
      makeChunk({ id: 'b', sourceTitle: '', sourcePath: '/docs/keys.txt', content: 'Rotate monthly.' }),
      makeChunk({ id: 'c', sourceTitle: '', sourcePath: '', content: 'No label.' }),
    ];

    expect(buildGroundedPrompt('How do deploys work?', context)).toBe(
      'Based on the following context from the documentation:\n\n' +
        '### Source 1 - Deploy:\nDeploys run from main.\n\n' +
        '### Source 2 - /docs/keys.txt:\nRotate monthly.\n\n' +
        '### Source 3:\nNo label.\n\n' +
        '---\n\n' +
        'Question: How do deploys work?\n\n' +
        GROUNDED_INSTRUCTIONS
    );
  });

  it('asks a plain question when nothing was retrieved', () => {
    const prompt = buildGroundedPrompt('What is on-call?', []);

    expect(prompt).toBe(`Question: What is on-call?\n\n${UNGROUNDED_INSTRUCTIONS}`);
    expect(prompt).not.toContain('context');
  });
});

describe('formatAnswer', () => {
  it('returns the trimmed answer when there are no sources', () => {
    expect(formatAnswer('  Run make deploy.\n', [])).toBe('Run make deploy.');
  });

  it('appends numbered sources with relevance', () => {
    const sources = [
      makeChunk({ score: 0.9 }),
      makeChunk({ id: 'b', sourceTitle: '', sourcePath: '/docs/keys.txt', score: 0.8734 }),
      makeChunk({ id: 'c', sourceTitle: '', sourcePath: '', score: 0 }),
      makeChunk({ id: 'd', score: undefined }),
    ];

    expect(formatAnswer('Run make deploy. ', sources)).toBe(
      'Run make deploy.\n\n**Sources:**\n' +
        '[1] Deploy (relevance: 90.0%)\n' +
        '[2] /docs/keys.txt (relevance: 87.3%)\n' +
        '[3] Document c\n' +
        '[4] Deploy\n'
    );
  });

  it('is a pass-through when formatted again without sources', () => {
    const once = formatAnswer('Answer', [makeChunk()]);

    expect(formatAnswer(once, [])).toBe(once.trim());
  });
});

describe('PromptBuilder.loadSystemPrompt', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'docent-prompt-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to the built-in prompt', async () => {
    await expect(new PromptBuilder().loadSystemPrompt()).resolves.toBe(DEFAULT_SYSTEM_PROMPT);
  });

  it('reads the configured file once', async () => {
    const file = join(dir, 'system.txt');
    writeFileSync(file, 'You answer about the billing service.');
    const builder = new PromptBuilder({ systemPromptFile: file });

    const [first, second] = await Promise.all([
      builder.loadSystemPrompt(),
      builder.loadSystemPrompt(),
    ]);
    writeFileSync(file, 'changed');
    const third = await builder.loadSystemPrompt();

    expect(first).toBe('You answer about the billing service.');
    expect(second).toBe(first);
    expect(third).toBe(first);
  });

  it('fails for an unreadable file and retries on the next call', async () => {
    const file = join(dir, 'later.txt');
    const builder = new PromptBuilder({ systemPromptFile: file });

    await expect(builder.loadSystemPrompt()).rejects.toBeInstanceOf(ConfigError);

    writeFileSync(file, 'Now it exists.');
    await expect(builder.loadSystemPrompt()).resolves.toBe('Now it exists.');
  });
});
