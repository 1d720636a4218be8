/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getApiKey, _clearEnvCache } from '../env.js';

describe('loadEnv', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('DOCENT_BACKEND', '');
    vi.stubEnv('DOCENT_SAFETY', '');
    vi.stubEnv('DOCENT_LOG_LEVEL', '');
    vi.stubEnv('OLLAMA_HOST', '');
    vi.stubEnv('LLAMACPP_URL', '');
    vi.stubEnv('OPENAI_BASE_URL', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('reads a valid backend override', () => {
    vi.stubEnv('DOCENT_BACKEND', 'llamacpp');

    expect(loadEnv().DOCENT_BACKEND).toBe('llamacpp');
  });

  it('drops an invalid backend instead of failing', () => {
    vi.stubEnv('DOCENT_BACKEND', 'vllm');

    expect(loadEnv().DOCENT_BACKEND).toBeUndefined();
  });

  it.each([
    ['on', true],
    ['true', true],
    ['1', true],
    ['off', false],
    ['false', false],
    ['0', false],
  ])('maps DOCENT_SAFETY=%s to %s', (raw, expected) => {
    vi.stubEnv('DOCENT_SAFETY', raw);

    expect(loadEnv().DOCENT_SAFETY).toBe(expected);
  });

  it('treats empty values as unset', () => {
    const env = loadEnv();

    expect(env.DOCENT_SAFETY).toBeUndefined();
    expect(env.OLLAMA_HOST).toBeUndefined();
  });

  it('reads host URLs', () => {
    vi.stubEnv('OLLAMA_HOST', 'http://10.0.0.5:11434');
    vi.stubEnv('LLAMACPP_URL', 'http://10.0.0.6:8080');

    const env = loadEnv();

    expect(env.OLLAMA_HOST).toBe('http://10.0.0.5:11434');
    expect(env.LLAMACPP_URL).toBe('http://10.0.0.6:8080');
  });

  it('caches after first load', () => {
    vi.stubEnv('DOCENT_LOG_LEVEL', 'debug');
    const first = loadEnv();

    vi.stubEnv('DOCENT_LOG_LEVEL', 'warn');

    expect(loadEnv()).toBe(first);
    expect(loadEnv().DOCENT_LOG_LEVEL).toBe('debug');
  });
});

describe('getApiKey', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns the trimmed key', () => {
    vi.stubEnv('DOCENT_TEST_KEY', '  test-secret  ');

    expect(getApiKey('DOCENT_TEST_KEY')).toBe('test-secret');
  });

  it('returns undefined for blank keys', () => {
    vi.stubEnv('DOCENT_TEST_KEY', '   ');

    expect(getApiKey('DOCENT_TEST_KEY')).toBeUndefined();
  });
});
