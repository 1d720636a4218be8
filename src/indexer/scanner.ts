/**
 * File Scanner
 *
 * Discovers ingestible documents under a directory with fast-glob, honouring
 * .gitignore, the default ignore list and configured patterns.
 */

import { statSync } from 'node:fs';
import { resolve, relative, extname } from 'node:path';
import fg from 'fast-glob';

import { createIgnoreFilter } from './ignore.js';
import {
  EXTENSION_TYPES,
  getDocumentType,
  type FileInfo,
  type ScanOptions,
  type ScanResult,
  type ScanStats,
  type SkippedFile,
} from './types.js';

/**
 * Build one brace glob matching any of the dotted extensions at any depth.
 */
export function buildGlobPattern(extensions: string[]): string {
  const bare = extensions.map((e) => e.replace(/^\./, '').toLowerCase());
  return bare.length === 1 ? `**/*.${bare[0]}` : `**/*.{${bare.join(',')}}`;
}

/**
 * Scan a directory for documents to ingest.
 *
 * Results are sorted by relative path so ingestion order is stable across
 * runs.
 *
 * @example
 * ```ts
 * const { files, skipped } = await scanDirectory('./handbook', {
 *   extensions: ['.md', '.pdf'],
 *   maxFileSize: 25 * 1024 * 1024,
 * });
 * ```
 */
export async function scanDirectory(
  rootPath: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const startTime = performance.now();
  const absoluteRoot = resolve(rootPath);

  const extensions = (options.extensions ?? Object.keys(EXTENSION_TYPES)).filter(
    (ext) => getDocumentType(ext) !== undefined
  );

  const stats: ScanStats = {
    totalFiles: 0,
    totalSize: 0,
    byType: { markdown: 0, text: 0, html: 0, pdf: 0 },
    scanDurationMs: 0,
  };
  const files: FileInfo[] = [];
  const skipped: SkippedFile[] = [];

  if (extensions.length === 0) {
    return { rootPath: absoluteRoot, files, skipped, stats };
  }

  const ignoreFilter = createIgnoreFilter({
    rootPath: absoluteRoot,
    additionalPatterns: options.additionalIgnorePatterns,
  });

  const entries = await fg(buildGlobPattern(extensions), {
    cwd: absoluteRoot,
    absolute: true,
    dot: false,
    onlyFiles: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: options.followSymlinks ?? false,
    suppressErrors: true,
  });

  for (const absolutePath of entries.sort()) {
    const relativePath = relative(absoluteRoot, absolutePath);
    if (ignoreFilter(relativePath)) {
      continue;
    }

    const extension = extname(absolutePath).toLowerCase();
    const type = getDocumentType(extension);
    if (type === undefined) {
      continue;
    }

    let size: number;
    let modifiedAt: string;
    try {
      const stat = statSync(absolutePath);
      size = stat.size;
      modifiedAt = stat.mtime.toISOString();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      skipped.push({ path: absolutePath, reason: err.message });
      options.onError?.(absolutePath, err);
      continue;
    }

    if (options.maxFileSize !== undefined && size > options.maxFileSize) {
      skipped.push({
        path: absolutePath,
        reason: `larger than ${Math.round(options.maxFileSize / (1024 * 1024))}MB`,
      });
      continue;
    }

    files.push({ path: absolutePath, relativePath, extension, type, size, modifiedAt });
    stats.totalFiles++;
    stats.totalSize += size;
    stats.byType[type]++;
  }

  stats.scanDurationMs = Math.round(performance.now() - startTime);

  return { rootPath: absoluteRoot, files, skipped, stats };
}
