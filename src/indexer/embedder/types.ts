/**
 * Embedder Types
 *
 * Providers return plain numeric vectors; the Embedder validates and
 * normalizes them into a row-major Float32Array matrix, which is also the
 * on-disk layout of the embedding artifact.
 */

import type { Logger } from '../../utils/logger.js';

/**
 * A backend that turns text into vectors.
 *
 * Implementations may return vectors of any scale; the Embedder
 * re-normalizes every row.
 */
export interface EmbeddingProvider {
  /** Short backend name for messages ("ollama") */
  readonly name: string;

  /** Model identifier, recorded in the index manifest */
  readonly model: string;

  /** Vector length, when known before the first call */
  readonly dimensions?: number;

  /** Embed a batch; must return exactly one vector per input, in order */
  embedBatch(texts: string[]): Promise<ArrayLike<number>[]>;
}

/**
 * `rows` unit vectors of length `dimensions`, stored row-major.
 */
export interface EmbeddingMatrix {
  rows: number;
  dimensions: number;
  data: Float32Array;
}

export interface EmbedderOptions {
  /**
   * Number of texts sent to the provider per call.
   * @default 32
   */
  batchSize?: number;

  /** Receives a debug line per batch */
  logger?: Logger;
}

export interface EmbedOptions {
  /**
   * Progress callback, fired after each batch completes.
   * @param processed - Number of texts embedded so far
   * @param total - Total number of texts to embed
   */
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Options for creating an embedding provider.
 */
export interface ProviderOptions {
  /** Ollama server URL; defaults to OLLAMA_HOST */
  ollamaHost?: string;

  /** Injected fetch, for tests */
  fetch?: typeof fetch;
}
