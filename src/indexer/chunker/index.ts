/**
 * Chunker Module
 *
 * Usage:
 * ```typescript
 * import { extractDocument, chunkDocument } from './chunker/index.js';
 *
 * const doc = await extractDocument(file);
 * const chunks = chunkDocument(doc, { chunkTokens: 1000, overlapTokens: 200 });
 * ```
 */

export { chunkText, chunkDocument, overlapSuffix, chunkId, titleFromPath } from './chunker.js';

export type { DocumentChunk, ChunkMetadata, MetadataValue, ExtractedDocument } from './types.js';

export {
  CHARS_PER_TOKEN,
  DEFAULT_CHUNK_CONFIG,
  estimateTokens,
  resolveChunkConfig,
  type ChunkConfig,
} from './config.js';

export {
  extractDocument,
  collapseWhitespace,
  extractMarkdownText,
  extractHtmlText,
  extractPdfText,
  stripHtml,
  decodeEntities,
} from './extractors/index.js';
