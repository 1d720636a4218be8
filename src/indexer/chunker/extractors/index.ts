/**
 * Extractors
 *
 * Turns a discovered file into an ExtractedDocument: format-specific text
 * extraction, whitespace collapsing and title selection.
 */

import { readFile } from 'node:fs/promises';

import { ExtractionError } from '../../../errors/index.js';
import type { DocumentType, FileInfo } from '../../types.js';
import type { ExtractedDocument } from '../types.js';
import { titleFromPath } from '../chunker.js';
import { extractHtmlText } from './html-extractor.js';
import { extractMarkdownText } from './markdown-extractor.js';
import { extractPdfText } from './pdf-extractor.js';

export { extractHtmlText, stripHtml, decodeEntities } from './html-extractor.js';
export { extractMarkdownText } from './markdown-extractor.js';
export { extractPdfText } from './pdf-extractor.js';

/**
 * Collapse every whitespace run to a single space.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

async function extractByType(
  type: DocumentType,
  path: string
): Promise<{ text: string; title?: string }> {
  switch (type) {
    case 'pdf':
      return extractPdfText(new Uint8Array(await readFile(path)));
    case 'html':
      return extractHtmlText(await readFile(path, 'utf-8'));
    case 'markdown':
      return extractMarkdownText(await readFile(path, 'utf-8'));
    case 'text':
      return { text: await readFile(path, 'utf-8') };
  }
}

/**
 * Extract plain text from a file.
 *
 * The title comes from the document itself (first H1, `<title>`) when it has
 * one, otherwise from the file name.
 *
 * @throws ExtractionError EXTRACTION_EMPTY when no text remains,
 *   EXTRACTION_FAILED when the file cannot be read or parsed
 */
export async function extractDocument(file: FileInfo): Promise<ExtractedDocument> {
  let extracted: { text: string; title?: string };
  try {
    extracted = await extractByType(file.type, file.path);
  } catch (error) {
    throw ExtractionError.failed(
      file.path,
      error instanceof Error ? error : new Error(String(error))
    );
  }

  const text = collapseWhitespace(extracted.text);
  if (text === '') {
    throw ExtractionError.empty(file.path);
  }

  return {
    path: file.path,
    title: extracted.title ?? titleFromPath(file.path),
    type: file.type,
    text,
    size: file.size,
    modifiedAt: file.modifiedAt,
  };
}
