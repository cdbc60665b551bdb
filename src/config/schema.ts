/**
 * Configuration Schema
 *
 * Defines the shape of ragdex.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Where the corpus is read from and where the index is written
 */
export const PathsConfigSchema = z.object({
  docs_dir: z.string().min(1).describe('Directory holding the plain-text corpus'),
  data_dir: z.string().min(1).describe('Directory the index is written to'),
});

/**
 * Which files in docs_dir count as documents
 */
export const CorpusConfigSchema = z.object({
  extensions: z
    .array(z.string().regex(/^[A-Za-z0-9]+$/, 'must be a bare extension such as "txt"'))
    .min(1)
    .describe('File extensions to ingest, without the leading dot'),
});

/**
 * Recursive splitter window size and overlap, in characters
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(1).describe('Maximum characters per chunk'),
  chunk_overlap: z.number().int().min(0).describe('Characters shared by consecutive chunks'),
});

export const EmbeddingProviderTypeSchema = z.enum(['ollama']);

/**
 * Embedding provider configuration
 * Vectors come from an Ollama server
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider (ollama calls OLLAMA_HOST)'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .describe('Number of texts to embed per batch (1-256, default 32)'),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of results to return'),
});

const FilenameSchema = z
  .string()
  .min(1)
  .regex(/^[^/\\]+$/, 'must be a file name, not a path');

/**
 * Persisted artifact names and per-row field limits
 */
export const StorageConfigSchema = z.object({
  embeddings_filename: FilenameSchema,
  metadata_filename: FilenameSchema,
  max_source_length: z.number().int().min(1).describe('Longest allowed chunk source label'),
  max_text_length: z.number().int().min(1).describe('Longest allowed chunk text'),
});

/**
 * Object shape of ragdex.toml, without cross-field rules
 */
export const ConfigObjectSchema = z.object({
  paths: PathsConfigSchema,
  corpus: CorpusConfigSchema,
  chunking: ChunkingConfigSchema,
  embedding: EmbeddingConfigSchema,
  search: SearchConfigSchema,
  storage: StorageConfigSchema,
});

/**
 * Root configuration schema, including the rules that span sections
 */
export const ConfigSchema = ConfigObjectSchema.superRefine((config, ctx) => {
  const { chunk_size, chunk_overlap } = config.chunking;

  if (chunk_overlap >= chunk_size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'chunk_overlap'],
      message: `must be less than chunking.chunk_size (${chunk_size})`,
    });
  }

  // A chunk can never be longer than chunk_size, so this keeps every chunk
  // within the metadata text limit.
  if (chunk_size > config.storage.max_text_length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'chunk_size'],
      message: `must not exceed storage.max_text_length (${config.storage.max_text_length})`,
    });
  }

  if (config.storage.embeddings_filename === config.storage.metadata_filename) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['storage', 'metadata_filename'],
      message: 'must differ from storage.embeddings_filename',
    });
  }
});

export type Config = z.infer<typeof ConfigObjectSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigObjectSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
