/**
 * SafetyGuard Tests
 */

import { describe, expect, it, vi } from 'vitest';

import { BackendError } from '../../errors/index.js';
import { FakeGenerator } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';
import { buildInputPrompt, buildOutputPrompt, SafetyGuard } from '../guard.js';

describe('classification prompts', () => {
  it('frames the question as the last user message', () => {
    const prompt = buildInputPrompt('How do I rotate keys?');

    expect(prompt).toContain("unsafe content in 'User' messages");
    expect(prompt).toContain('S1: Violent Crimes.\nS2: Non-Violent Crimes.');
    expect(prompt).toContain('S14: Code Interpreter Abuse.\n<END UNSAFE CONTENT CATEGORIES>');
    expect(prompt).toContain('<BEGIN CONVERSATION>\n\nUser: How do I rotate keys?\n\n<END CONVERSATION>');
    expect(prompt).toContain('ONLY THE LAST User message');
  });

  it('frames the answer as an agent message', () => {
    const prompt = buildOutputPrompt('Use the rotate command.');

    expect(prompt).toContain("unsafe content in 'Agent' messages");
    expect(prompt).toContain('Agent: Use the rotate command.');
    expect(prompt).toContain('ONLY THE LAST Agent message');
  });
});

describe('SafetyGuard', () => {
  it('sends a deterministic short request and parses the reply', async () => {
    const generator = new FakeGenerator(['unsafe\nS2']);
    const guard = new SafetyGuard(generator, { logger: silentLogger });

    const verdict = await guard.checkInput('how to pick a lock');

    expect(verdict).toEqual({ isSafe: false, category: 'S2', reason: 'Non-Violent Crimes' });
    expect(generator.requests).toEqual([
      { prompt: buildInputPrompt('how to pick a lock'), temperature: 0, maxTokens: 100 },
    ]);
  });

  it('checks answers with the output prompt', async () => {
    const generator = new FakeGenerator(['safe']);
    const guard = new SafetyGuard(generator, { logger: silentLogger });

    await expect(guard.checkOutput('Deploys run nightly.')).resolves.toEqual({ isSafe: true });
    expect(generator.requests[0]?.prompt).toBe(buildOutputPrompt('Deploys run nightly.'));
  });

  it('warns when the reply cannot be read', async () => {
    const logger = { warn: vi.fn() };
    const guard = new SafetyGuard(new FakeGenerator([' maybe ']), { logger });

    const verdict = await guard.checkInput('hello');

    expect(verdict.isSafe).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Unrecognised guard reply from fake-model: maybe');
  });

  it('propagates backend failures', async () => {
    const failure = BackendError.unavailable('ollama', new Error('connection refused'));
    const guard = new SafetyGuard(new FakeGenerator([failure]), { logger: silentLogger });

    await expect(guard.checkInput('hello')).rejects.toBe(failure);
  });

  it('reports the guard backend health', async () => {
    const guard = new SafetyGuard(new FakeGenerator([], 'ollama guard'));

    await expect(guard.healthCheck()).resolves.toMatchObject({ name: 'ollama guard', healthy: true });
  });
});
