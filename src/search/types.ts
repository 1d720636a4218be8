/**
 * Search Types
 */

import type { DocumentChunk } from '../indexer/chunker/types.js';
import type { HealthStatus } from '../providers/types.js';

/**
 * Query-time retrieval. Results are sorted by descending score, each in
 * [0, 1].
 */
export interface Retriever {
  search(query: string, topK: number, signal?: AbortSignal): Promise<DocumentChunk[]>;
  healthCheck(signal?: AbortSignal): Promise<HealthStatus>;
}

export interface VectorSearchOptions {
  topK: number;
  /** Results scoring below this are dropped */
  minScore?: number;
}
