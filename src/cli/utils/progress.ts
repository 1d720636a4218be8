/**
 * Progress Reporter
 *
 * Progress display for `docent ingest`. Three output modes:
 * - Interactive: ora spinner with throttled updates
 * - JSON: NDJSON event stream on stdout
 * - Text: plain lines for non-TTY output
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { IngestResult, IngestStage } from '../../indexer/pipeline.js';

const STAGE_LABELS: Record<IngestStage, string> = {
  scanning: 'Scanning',
  processing: 'Ingesting',
};

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show every warning and the skipped-file list */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;

  /** Where lines go; defaults to console.log */
  write?: (line: string) => void;
}

export type ProgressEventType = 'stage_start' | 'stage_progress' | 'warning' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IngestStage;
  data: Record<string, unknown>;
}

/**
 * Wire the reporter's methods straight into runIngest's callbacks:
 *
 * ```typescript
 * const reporter = createProgressReporter({ json: ctx.options.json });
 * const result = await runIngest({
 *   ...,
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (done, total, file) => reporter.updateProgress(done, file),
 *   onWarning: (message, file) => reporter.warn(message, file),
 * });
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private readonly write: (line: string) => void;
  private spinner: Ora | null = null;
  private currentStage: IngestStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;
  private warnings = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file path display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
    this.write = options.write ?? ((line) => console.log(line));

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  startStage(stage: IngestStage, total = 0): void {
    this.finishSpinner();
    this.currentStage = stage;
    this.currentTotal = total;
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    const text = total > 0 ? `${label} ${total} files...` : `${label}...`;
    if (this.options.isInteractive) {
      this.spinner = ora({ text }).start();
    } else {
      this.write(text);
    }
  }

  updateProgress(processed: number, currentFile?: string): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        stage: this.currentStage,
        data: { processed, total: this.currentTotal, currentFile },
      });
      return;
    }

    if (this.spinner) {
      const percentage =
        this.currentTotal > 0 ? Math.round((processed / this.currentTotal) * 100) : 0;
      const progressText = `${processed}/${this.currentTotal} (${percentage}%)`;
      this.spinner.text = currentFile
        ? `${progressText.padEnd(18)} ${chalk.dim(truncatePath(currentFile, ProgressReporter.MAX_PATH_LENGTH))}`
        : progressText;
    } else if (this.options.verbose && currentFile) {
      this.write(chalk.dim(`  → ${currentFile}`));
    }
  }

  /**
   * Non-fatal problem with one file. Shown as it happens in verbose or
   * non-interactive mode; otherwise only counted in the summary.
   */
  warn(message: string, context?: string): void {
    this.warnings++;

    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  /** Stop the spinner without a summary, e.g. when the run failed */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
    this.currentStage = null;
  }

  showSummary(result: IngestResult): void {
    this.finishSpinner();
    this.currentStage = null;

    if (this.options.json) {
      this.emitJson({ type: 'complete', data: { result } });
      return;
    }

    this.write('');
    this.write(chalk.green.bold('Ingest Complete ✓'));
    this.write('');
    this.write(`  ${chalk.dim('Files scanned:')}    ${result.filesScanned.toLocaleString()}`);
    this.write(`  ${chalk.dim('Files ingested:')}   ${result.filesProcessed.toLocaleString()}`);
    this.write(`  ${chalk.dim('Chunks created:')}   ${result.chunksCreated.toLocaleString()}`);
    this.write(`  ${chalk.dim('Chunks stored:')}    ${result.chunksStored.toLocaleString()}`);
    this.write(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(result.durationMs)}`);

    if (result.skipped.length > 0) {
      this.write('');
      this.write(chalk.yellow(`  ${result.skipped.length} file(s) skipped`));
      if (this.options.verbose) {
        for (const file of result.skipped.slice(0, 10)) {
          this.write(chalk.dim(`    - ${file.path}: ${file.reason}`));
        }
        if (result.skipped.length > 10) {
          this.write(chalk.dim(`    ... and ${result.skipped.length - 10} more`));
        }
      }
    }

    if (result.errors.length > 0) {
      this.write(chalk.yellow(`  ${result.errors.length} chunk(s) could not be embedded`));
    }

    this.write('');
  }

  get warningCount(): number {
    return this.warnings;
  }

  private finishSpinner(): void {
    if (this.spinner && this.currentStage) {
      this.spinner.succeed(`${STAGE_LABELS[this.currentStage]} done`);
    }
    this.spinner = null;
  }

  private emitJson(event: Omit<ProgressEvent, 'timestamp'>): void {
    const full: ProgressEvent = { ...event, timestamp: new Date().toISOString() };
    this.write(JSON.stringify(full));
  }
}

/**
 * Keep the last `max` characters of a path, prefixed with "...".
 */
export function truncatePath(path: string, max: number): string {
  if (path.length <= max) {
    return path;
  }
  return '...' + path.slice(-(max - 3));
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter, detecting TTY and NO_COLOR.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
    write: options.write,
  });
}
