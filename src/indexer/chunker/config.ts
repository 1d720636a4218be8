/**
 * Chunker Configuration
 *
 * Token budgeting is approximate: one token is taken to be four characters
 * of English text. No tokenizer is loaded.
 */

/** Characters per approximate token */
export const CHARS_PER_TOKEN = 4;

/**
 * Chunk size and overlap, both in approximate tokens.
 */
export interface ChunkConfig {
  chunkTokens: number;
  overlapTokens: number;
}

/** Matches `[indexing]` defaults in config.toml */
export const DEFAULT_CHUNK_CONFIG: ChunkConfig = {
  chunkTokens: 1000,
  overlapTokens: 200,
};

/**
 * Estimate token count from text (~4 characters per token).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Resolve per-run overrides against configured values. Zero or a missing
 * override means "use the configured value".
 */
export function resolveChunkConfig(
  configured: ChunkConfig,
  overrides: Partial<ChunkConfig> = {}
): ChunkConfig {
  return {
    chunkTokens: overrides.chunkTokens || configured.chunkTokens,
    overlapTokens: overrides.overlapTokens || configured.overlapTokens,
  };
}
