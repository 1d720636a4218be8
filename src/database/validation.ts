/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. better-sqlite3
 * returns `unknown` rows; these schemas turn them into typed values and
 * catch schema drift (failed migrations, manual edits) with a clear error.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM collections WHERE name = ?').get(name);
 * return row ? validateRow(CollectionRowSchema, row, `collections.name=${name}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';

import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

export const CollectionRowSchema = z.object({
  name: z.string(),
  embedding_model: z.string(),
  dimensions: z.number().int().positive(),
  created_at: z.string(),
  indexed_at: z.string().nullable(),
});

export type CollectionRow = z.infer<typeof CollectionRowSchema>;

/**
 * Columns read when scoring chunks. `embedding` is the raw BLOB; conversion
 * to Float32Array happens in the store.
 */
export const ChunkRowSchema = z.object({
  id: z.string(),
  content: z.string(),
  embedding: z.instanceof(Buffer),
  source_path: z.string(),
  source_title: z.string(),
  source_type: z.enum(['markdown', 'text', 'html', 'pdf']),
  chunk_index: z.number().int().nonnegative(),
  total_chunks: z.number().int().positive(),
  metadata: z.string().nullable(),
});

export type ChunkRow = z.infer<typeof ChunkRowSchema>;

export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
});

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails schema validation.
 *
 * Exit code 5: Database error
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe database may predate this version of docent.\n` +
      `Try: docent reset  and ingest again`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row.
 *
 * @param context - where the row came from, for the error message
 * @throws SchemaValidationError
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of rows, throwing on the first invalid one.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
