/**
 * Chunker
 *
 * Splits extracted document text into overlapping, size-bounded chunks.
 *
 * Algorithm (greedy word packing):
 * 1. Split the text on whitespace into words
 * 2. Append words to a running chunk while it stays within maxTokens * 4 chars
 * 3. When the next word would overflow a non-empty chunk, close the chunk and
 *    seed the next one with the closed chunk's overlap suffix plus that word
 * 4. Flush the final partial chunk
 *
 * A single word longer than the budget is never split; it becomes an
 * oversized chunk of its own. Output depends only on the inputs.
 */

import { createHash } from 'node:crypto';
import { basename, extname } from 'node:path';

import { CHARS_PER_TOKEN } from './config.js';
import type { ChunkConfig } from './config.js';
import type { DocumentChunk, ExtractedDocument, MetadataValue } from './types.js';

// ============================================================================
// Text chunking
// ============================================================================

/**
 * Trailing `overlapChars` of `text`, moved forward to the next word boundary.
 *
 * Scans forward from the truncation point to the first space and returns the
 * trimmed remainder from there. If no space follows, the raw truncation is
 * returned (trimmed).
 */
export function overlapSuffix(text: string, overlapChars: number): string {
  if (text.length <= overlapChars) {
    return text;
  }

  const start = text.length - overlapChars;
  const boundary = text.indexOf(' ', start);
  return (boundary === -1 ? text.slice(start) : text.slice(boundary)).trim();
}

/**
 * Split text into chunks of at most `maxTokens * 4` characters, with roughly
 * `overlapTokens * 4` characters repeated between consecutive chunks.
 *
 * Empty or whitespace-only text yields `[]`. So do non-positive or
 * non-finite budgets, which configuration validation rules out upstream.
 *
 * @example
 * ```ts
 * chunkText('the quick brown fox jumps over the lazy dog again and again', 10, 2);
 * // ['the quick brown fox jumps over the lazy', 'lazy dog again and again']
 * ```
 */
export function chunkText(text: string, maxTokens: number, overlapTokens: number): string[] {
  if (!Number.isFinite(maxTokens) || maxTokens <= 0) {
    return [];
  }

  const maxChars = maxTokens * CHARS_PER_TOKEN;
  const overlapChars = Number.isFinite(overlapTokens)
    ? Math.max(0, overlapTokens) * CHARS_PER_TOKEN
    : 0;

  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const chunks: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;

    if (candidate.length > maxChars && current !== '') {
      chunks.push(current.trim());
      current = overlapChars > 0 ? `${overlapSuffix(current, overlapChars)} ${word}` : word;
    } else {
      current = candidate;
    }
  }

  const last = current.trim();
  if (last !== '') {
    chunks.push(last);
  }

  return chunks;
}

// ============================================================================
// Document chunking
// ============================================================================

/**
 * Deterministic chunk id: md5 of the source path, then the chunk index.
 * Re-ingesting a file with the same parameters reproduces the same ids.
 */
export function chunkId(sourcePath: string, chunkIndex: number): string {
  const digest = createHash('md5').update(sourcePath).digest('hex');
  return `${digest}-${chunkIndex}`;
}

/**
 * Human title from a file name: `getting_started-guide.md` → `Getting Started Guide`.
 * Only the first letter of each word is changed.
 */
export function titleFromPath(filePath: string): string {
  const stem = basename(filePath, extname(filePath));
  return stem
    .replace(/[_-]/g, ' ')
    .split(' ')
    .map((word) => (word ? word.charAt(0).toUpperCase() + word.slice(1) : word))
    .join(' ');
}

/**
 * Chunk an extracted document into DocumentChunks with ids and metadata.
 *
 * @param extraMetadata - appended after the standard keys
 */
export function chunkDocument(
  doc: ExtractedDocument,
  config: ChunkConfig,
  extraMetadata: Record<string, MetadataValue> = {}
): DocumentChunk[] {
  const pieces = chunkText(doc.text, config.chunkTokens, config.overlapTokens);
  const totalChunks = pieces.length;

  return pieces.map((content, chunkIndex) => ({
    id: chunkId(doc.path, chunkIndex),
    content,
    metadata: {
      path: doc.path,
      title: doc.title,
      type: doc.type,
      size: doc.size,
      modified: doc.modifiedAt,
      chunk_id: chunkIndex,
      total_chunks: totalChunks,
      ...extraMetadata,
    },
    sourcePath: doc.path,
    sourceTitle: doc.title,
    sourceType: doc.type,
    chunkIndex,
    totalChunks,
  }));
}
