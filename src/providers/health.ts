/**
 * Backend Health Probes
 *
 * Lightweight HTTP checks that never throw: each returns a HealthStatus.
 * - Ollama: GET /api/tags and look for the model
 * - llama.cpp: GET /health
 * - OpenAI-compatible: GET /models with the bearer key
 */

import { z } from 'zod';

import { trimBaseUrl } from './client.js';
import type { BackendSpec, HealthStatus } from './types.js';

/** Probes are quick; a backend that takes longer is reported down */
export const HEALTH_TIMEOUT_MS = 5000;

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Whether an Ollama tag list contains `model`. A model given without a tag
 * matches any tag of it (`llama3.1` matches `llama3.1:8b`).
 */
export function hasOllamaModel(available: string[], model: string): boolean {
  return available.some((name) => name === model || name.startsWith(`${model}:`));
}

async function timed(
  name: string,
  probe: () => Promise<{ healthy: boolean; message: string }>
): Promise<HealthStatus> {
  const start = performance.now();
  try {
    const { healthy, message } = await probe();
    return { name, healthy, message, latencyMs: Math.round(performance.now() - start) };
  } catch (error) {
    return {
      name,
      healthy: false,
      message: error instanceof Error ? error.message : String(error),
      latencyMs: Math.round(performance.now() - start),
    };
  }
}

export function probeOllama(
  name: string,
  baseUrl: string,
  model: string,
  signal?: AbortSignal
): Promise<HealthStatus> {
  return timed(name, async () => {
    const response = await fetch(`${trimBaseUrl(baseUrl)}/api/tags`, {
      signal: signal ?? AbortSignal.timeout(HEALTH_TIMEOUT_MS),
    });
    if (!response.ok) {
      return { healthy: false, message: `HTTP ${response.status}` };
    }

    const tags = OllamaTagsSchema.parse(await response.json());
    const names = tags.models.map((m) => m.name);
    return hasOllamaModel(names, model)
      ? { healthy: true, message: `model ${model} available` }
      : { healthy: false, message: `model ${model} not found (run: ollama pull ${model})` };
  });
}

export function probeLlamaCpp(
  name: string,
  baseUrl: string,
  signal?: AbortSignal
): Promise<HealthStatus> {
  return timed(name, async () => {
    const response = await fetch(`${trimBaseUrl(baseUrl)}/health`, {
      signal: signal ?? AbortSignal.timeout(HEALTH_TIMEOUT_MS),
    });
    // 503 while the model is still loading
    return response.ok
      ? { healthy: true, message: 'server ready' }
      : { healthy: false, message: `HTTP ${response.status}` };
  });
}

export function probeOpenAICompatible(
  name: string,
  baseUrl: string,
  apiKey: string,
  signal?: AbortSignal
): Promise<HealthStatus> {
  return timed(name, async () => {
    const response = await fetch(`${trimBaseUrl(baseUrl)}/models`, {
      headers: { Authorization: `Bearer ${apiKey}` },
      signal: signal ?? AbortSignal.timeout(HEALTH_TIMEOUT_MS),
    });
    return response.ok
      ? { healthy: true, message: 'endpoint reachable' }
      : { healthy: false, message: `HTTP ${response.status}` };
  });
}

/**
 * Probe whichever backend `spec` names.
 */
export function probeBackend(
  name: string,
  spec: BackendSpec,
  signal?: AbortSignal
): Promise<HealthStatus> {
  switch (spec.kind) {
    case 'ollama':
      return probeOllama(name, spec.baseUrl, spec.model, signal);
    case 'llamacpp':
      return probeLlamaCpp(name, spec.baseUrl, signal);
    case 'openai-compatible':
      return probeOpenAICompatible(name, spec.baseUrl, spec.apiKey, signal);
  }
}
