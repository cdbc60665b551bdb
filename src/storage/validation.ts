/**
 * Artifact Validation
 *
 * Zod schemas for everything read back from the data directory. A file
 * that parses but does not match is an IndexIntegrityError, never a
 * silently empty index.
 */

import { isAbsolute } from 'node:path';
import { z, type ZodIssue } from 'zod';
import { IndexIntegrityError } from '../errors/index.js';

// ============================================================================
// Manifest Schema
// ============================================================================

/**
 * A path relative to the data directory that cannot escape it.
 */
const ArtifactPathSchema = z
  .string()
  .min(1)
  .refine((value) => !isAbsolute(value) && !value.split(/[\\/]/).includes('..'), {
    message: 'must be a path inside the data directory',
  });

export const ManifestSchema = z.object({
  formatVersion: z.literal(1),
  buildId: z.string().min(1),
  createdAt: z.string().datetime(),
  model: z.string().min(1),
  dimensions: z.number().int().nonnegative(),
  documentCount: z.number().int().nonnegative(),
  chunkCount: z.number().int().nonnegative(),
  embeddingsFile: ArtifactPathSchema,
  metadataFile: ArtifactPathSchema,
});

export type IndexManifest = z.infer<typeof ManifestSchema>;

// ============================================================================
// Metadata Schema
// ============================================================================

export const ChunkRecordSchema = z.object({
  id: z.number().int().min(0).max(0x7fffffff),
  source: z.string().min(1),
  text: z.string().min(1),
});

export type ChunkRecord = z.infer<typeof ChunkRecordSchema>;

/**
 * The metadata artifact. Rows must respect the limits recorded alongside
 * them, and ids must equal their row position.
 */
export const MetadataFileSchema = z
  .object({
    formatVersion: z.literal(1),
    maxSourceLength: z.number().int().positive(),
    maxTextLength: z.number().int().positive(),
    rows: z.array(ChunkRecordSchema),
  })
  .superRefine((file, ctx) => {
    file.rows.forEach((row, index) => {
      if (row.id !== index) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index, 'id'],
          message: `expected id ${index}, found ${row.id}`,
        });
      }
      if (row.source.length > file.maxSourceLength) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index, 'source'],
          message: `longer than ${file.maxSourceLength} characters`,
        });
      }
      if (row.text.length > file.maxTextLength) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index, 'text'],
          message: `longer than ${file.maxTextLength} characters`,
        });
      }
    });
  });

export type MetadataFile = z.infer<typeof MetadataFileSchema>;

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Summarize zod issues, showing the first three.
 */
export function summarizeIssues(issues: ZodIssue[]): string {
  const lines = issues.slice(0, 3).map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  if (issues.length > 3) {
    lines.push(`... and ${issues.length - 3} more`);
  }
  return lines.join('; ');
}

/**
 * Parse a JSON artifact and validate it against a schema.
 *
 * @param context - What is being read, for error messages (e.g. a file path)
 * @throws IndexIntegrityError if the text is not JSON or does not match
 */
export function parseArtifact<T extends z.ZodTypeAny>(
  schema: T,
  content: string,
  context: string
): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new IndexIntegrityError(`${context} is not valid JSON`, undefined, { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new IndexIntegrityError(
      `${context} is malformed: ${summarizeIssues(result.error.issues)}`
    );
  }
  return result.data;
}
