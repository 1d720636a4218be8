/**
 * Evaluation Test Files
 *
 * JSONL: one case per line, blank lines ignored. Every line is validated
 * with Zod and all problems are reported together.
 */

import * as fs from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

import { FileNotFoundError, ValidationError } from '../errors/index.js';
import { EvalCaseSchema, type EvalCase, type EvalReport } from './types.js';

/**
 * Parse JSONL content into cases.
 *
 * @throws ValidationError listing every invalid line
 */
export function parseEvalCases(content: string, source = 'test file'): EvalCase[] {
  const cases: EvalCase[] = [];
  const issues: string[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }
    const lineNumber = index + 1;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      issues.push(`line ${lineNumber}: invalid JSON`);
      return;
    }

    const result = EvalCaseSchema.safeParse(parsed);
    if (result.success) {
      cases.push(result.data);
    } else {
      issues.push(...formatIssues(lineNumber, result.error));
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(`Invalid ${source}`, issues);
  }
  if (cases.length === 0) {
    throw new ValidationError(`No test cases in ${source}`);
  }
  return cases;
}

function formatIssues(lineNumber: number, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.');
    return `line ${lineNumber}: ${field ? `${field}: ` : ''}${issue.message}`;
  });
}

/**
 * Read and validate a JSONL test file.
 *
 * @throws FileNotFoundError if the file does not exist
 * @throws ValidationError if any line is invalid or there are no cases
 */
export function loadEvalCases(path: string): EvalCase[] {
  if (!fs.existsSync(path)) {
    throw new FileNotFoundError(path);
  }
  return parseEvalCases(fs.readFileSync(path, 'utf-8'), path);
}

/**
 * Write a report as pretty-printed JSON, creating the directory if needed.
 */
export function writeEvalReport(path: string, report: EvalReport): void {
  const dir = dirname(path);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(path, JSON.stringify(report, null, 2) + '\n', 'utf-8');
}
