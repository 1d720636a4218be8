/**
 * Gitignore Pattern Handling
 *
 * Uses the 'ignore' package, which implements the full gitignore spec.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, relative, sep } from 'node:path';
import ignore from 'ignore';

import { DEFAULT_IGNORE_PATTERNS } from './types.js';

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;

  /** Additional patterns to ignore (merged with .gitignore) */
  additionalPatterns?: string[];

  /** @default true */
  useDefaults?: boolean;
}

/**
 * Returns true when a path should be IGNORED.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Parse gitignore file content, dropping blank lines and comments.
 * Negations (`!keep.md`) are kept.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }
  return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
}

/**
 * Build an ignore filter from, in increasing priority: the default patterns,
 * the root .gitignore, and `additionalPatterns`.
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({ rootPath: '/docs', additionalPatterns: ['drafts/'] });
 * shouldIgnore('drafts/plan.md'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;

  const ig = ignore();

  if (useDefaults) {
    ig.add(DEFAULT_IGNORE_PATTERNS);
  }

  ig.add(loadGitignoreFile(join(rootPath, '.gitignore')));

  if (additionalPatterns.length > 0) {
    ig.add(additionalPatterns);
  }

  return (filePath: string): boolean => {
    let relativePath = isAbsolute(filePath) ? relative(rootPath, filePath) : filePath;

    // The ignore package expects forward slashes
    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    // The root itself, or anything outside it, is never ignored
    if (relativePath === '' || relativePath.startsWith('..')) {
      return false;
    }

    return ig.ignores(relativePath);
  };
}
