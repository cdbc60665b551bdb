/**
 * Environment Variable Handler
 *
 * Reads configuration overrides from the environment.
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { EmbeddingProviderTypeSchema, type PartialConfig } from './schema.js';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

const IntegerString = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform(Number);

/**
 * Environment variables ragdex understands. All are optional; unset
 * values fall through to ragdex.toml and then to the defaults.
 */
export const EnvSchema = z.object({
  RAGDEX_CONFIG: z.string().optional(),
  RAG_TOP_K: IntegerString.optional(),
  CHUNK_SIZE: IntegerString.optional(),
  CHUNK_OVERLAP: IntegerString.optional(),
  DOCS_DIR: z.string().optional(),
  DATA_DIR: z.string().optional(),
  EMBEDDING_PROVIDER: EmbeddingProviderTypeSchema.optional(),
  EMBEDDING_MODEL: z.string().optional(),
  EMBEDDING_BATCH_SIZE: IntegerString.optional(),
  EMBEDDINGS_FILENAME: z.string().optional(),
  META_FILENAME: z.string().optional(),
  OLLAMA_HOST: z.string().url().default(DEFAULT_OLLAMA_HOST),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse an environment map. Empty strings count as unset.
 *
 * @throws ConfigurationError listing every malformed variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvVars {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = source[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value;
    }
  }

  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid environment variables:',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      'Fix or unset the variables listed above'
    );
  }
  return result.data;
}

/**
 * Load environment variables from process.env (parsed once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache === null) {
    _envCache = parseEnv(process.env);
  }
  return _envCache;
}

/**
 * Get the Ollama host URL, or the local default if not configured.
 */
export function getOllamaHost(): string {
  return loadEnv().OLLAMA_HOST;
}

/**
 * Turn environment overrides into a sparse config layer.
 */
export function envToPartialConfig(env: EnvVars): PartialConfig {
  return {
    paths: {
      docs_dir: env.DOCS_DIR,
      data_dir: env.DATA_DIR,
    },
    chunking: {
      chunk_size: env.CHUNK_SIZE,
      chunk_overlap: env.CHUNK_OVERLAP,
    },
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      model: env.EMBEDDING_MODEL,
      batch_size: env.EMBEDDING_BATCH_SIZE,
    },
    search: {
      top_k: env.RAG_TOP_K,
    },
    storage: {
      embeddings_filename: env.EMBEDDINGS_FILENAME,
      metadata_filename: env.META_FILENAME,
    },
  };
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
