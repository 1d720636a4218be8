/**
 * Zod validation schemas for CLI inputs
 *
 * Commander hands every option over as a string; these schemas coerce and
 * range-check them before a command touches the pipeline.
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

/** `unsetZero` lets 0 through to mean "use the configured value" */
const integerOption = (name: string, min: number, max: number, unsetZero = false) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => (unsetZero && val === 0) || (val >= min && val <= max), {
      message: `${name} must be between ${min} and ${max}`,
    });

// ============================================================================
// ASK COMMAND SCHEMA
// ============================================================================

export const AskOptionsSchema = z.object({
  topK: integerOption('--top-k', 1, 50).optional(),
  temperature: z
    .string()
    .transform((val) => Number(val))
    .refine((val) => Number.isFinite(val) && val >= 0 && val <= 2, {
      message: '--temperature must be a number between 0 and 2',
    })
    .optional(),
  stream: z.boolean().default(false),
});

export type AskOptionsInput = z.input<typeof AskOptionsSchema>;

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z.object({
  chunkSize: integerOption('--chunk-size', 100, 4000, true).optional(),
  overlap: integerOption('--overlap', 0, 3999).optional(),
});

export type IngestOptionsInput = z.input<typeof IngestOptionsSchema>;

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Validate command input against a schema.
 *
 * @throws ValidationError listing every issue
 *
 * @example
 * ```typescript
 * const { topK } = validateInput(AskOptionsSchema, cmdOptions);
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError('Invalid command options', issues);
}
