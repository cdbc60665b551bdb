/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js hands every option over as a string; these schemas coerce
 * and range-check them before they reach the library.
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

export const MAX_TOP_K = 100;

/** Parse a decimal integer option such as "--top 5" */
const integerString = (label: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a whole number`)
    .transform((val) => parseInt(val, 10));

// ============================================================================
// QUERY COMMANDS (search, context)
// ============================================================================

export const TopKSchema = integerString('--top').pipe(
  z
    .number()
    .min(1, '--top must be at least 1')
    .max(MAX_TOP_K, `--top cannot exceed ${MAX_TOP_K}`)
);

export const QueryArgSchema = z
  .string()
  .trim()
  .min(1, 'Query cannot be empty')
  .max(2000, 'Query too long (max 2000 chars)');

// ============================================================================
// INGEST COMMAND
// ============================================================================

export const IngestOptionsSchema = z.object({
  docs: z.string().min(1, '--docs cannot be empty').optional(),
  data: z.string().min(1, '--data cannot be empty').optional(),
  chunkSize: integerString('--chunk-size')
    .pipe(z.number().min(1, '--chunk-size must be at least 1'))
    .optional(),
  chunkOverlap: integerString('--chunk-overlap').optional(),
});

export type IngestOptions = z.output<typeof IngestOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema.
 *
 * @throws ValidationError listing every issue
 *
 * @example
 * ```typescript
 * const topK = parseInput(TopKSchema, cmdOptions.top, 'Invalid --top value');
 * ```
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message = 'Invalid input'
): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError(message, issues);
}
