/**
 * JSON Utilities
 *
 * Schema-checked JSON parsing with fallback, for values read back from
 * SQLite or JSONL files where corruption is possible.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a Zod schema.
 *
 * Returns `fallback` when the input is null/undefined, is not valid JSON, or
 * does not match the schema. `onError` receives the reason in the last two
 * cases.
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, MetadataSchema, {});
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny>(
  json: string | null | undefined,
  schema: S,
  fallback: z.infer<S>,
  onError?: (error: Error, rawValue: string) => void
): z.infer<S> {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    onError?.(new Error(result.error.issues.map((i) => i.message).join('; ')), json);
    return fallback;
  }
  return result.data;
}
