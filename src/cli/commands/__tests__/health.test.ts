/**
 * Tests for health command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { createHealthCommand, formatHealthTable } from '../health.js';
import type { CommandContext } from '../../types.js';
import * as runtime from '../../utils/runtime.js';
import * as factory from '../../../agent/factory.js';
import * as database from '../../../database/index.js';
import type { Pipeline } from '../../../agent/factory.js';
import { DEFAULT_CONFIG } from '../../../config/index.js';
import type { HealthStatus } from '../../../providers/types.js';
import { silentLogger } from '../../../utils/logger.js';

vi.mock('../../utils/runtime.js', () => ({
  loadCommandConfig: vi.fn(),
  createCommandLogger: vi.fn(),
}));

vi.mock('../../../agent/factory.js', () => ({
  createPipeline: vi.fn(),
  checkHealth: vi.fn(),
}));

vi.mock('../../../database/index.js', () => ({
  closeDb: vi.fn(),
}));

const HEALTHY: HealthStatus[] = [
  { name: 'ollama', healthy: true, message: 'llama3.1:8b available', latencyMs: 12 },
  { name: 'safety guard', healthy: true, message: 'disabled', latencyMs: 0 },
  { name: 'ollama embeddings', healthy: true, message: 'nomic-embed-text available', latencyMs: 9 },
  { name: 'vector store', healthy: true, message: '42 chunks in "docs"', latencyMs: 1 },
];

describe('createHealthCommand', () => {
  let logOutput: string[];
  let mockContext: CommandContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  async function run(): Promise<void> {
    const program = new Command();
    program.addCommand(createHealthCommand(() => mockContext));
    await program.parseAsync(['node', 'docent', 'health']);
  }

  beforeEach(() => {
    logOutput = [];
    process.exitCode = undefined;
    mockContext = {
      options: { verbose: false, json: false, safety: true },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    vi.mocked(runtime.loadCommandConfig).mockReturnValue(DEFAULT_CONFIG);
    vi.mocked(runtime.createCommandLogger).mockReturnValue(silentLogger);
    vi.mocked(factory.createPipeline).mockReturnValue({} as Pipeline);
    vi.mocked(factory.checkHealth).mockResolvedValue(HEALTHY);

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('creates command with correct name', () => {
    expect(createHealthCommand(() => mockContext).name()).toBe('health');
  });

  it('prints a row per check', async () => {
    await run();

    const output = logOutput.join('\n');
    expect(output).toContain('42 chunks in "docs"');
    expect(output).toContain('llama3.1:8b available');
    expect(output).toContain('All checks passed');
    expect(process.exitCode).toBeUndefined();
    expect(database.closeDb).toHaveBeenCalled();
  });

  it('sets exit code 1 when a check fails', async () => {
    vi.mocked(factory.checkHealth).mockResolvedValue([
      { name: 'ollama', healthy: false, message: 'connection refused', latencyMs: 3 },
      ...HEALTHY.slice(1),
    ]);

    await run();

    expect(logOutput.join('\n')).toContain('1 check(s) failed');
    expect(process.exitCode).toBe(1);
  });

  it('prints JSON with --json', async () => {
    mockContext.options.json = true;

    await run();

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({ healthy: true, checks: HEALTHY });
  });
});

describe('formatHealthTable', () => {
  it('right-aligns latency', () => {
    const table = formatHealthTable(HEALTHY);
    const lines = table.split('\n');
    expect(lines).toHaveLength(8);
    expect(lines[3]).toContain('│    12ms │');
    expect(lines[4]).toContain('│     0ms │');
  });
});
