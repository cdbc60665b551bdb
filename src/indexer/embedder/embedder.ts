/**
 * Embedder Orchestration
 *
 * Wraps an EmbeddingProvider and guarantees what the index relies on:
 * 1. One vector per input, in input order
 * 2. A single, consistent dimension D across every call
 * 3. Unit L2 norm on every row
 *
 * A provider failure or an unusable vector raises EmbeddingError; no
 * default or partial vector is ever returned.
 */

import { EmbeddingError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import type {
  EmbeddingMatrix,
  EmbeddingProvider,
  EmbedderOptions,
  EmbedOptions,
} from './types.js';

/** Default batch size - 32 is a good balance of speed vs memory */
export const DEFAULT_BATCH_SIZE = 32;

/**
 * Copy `vector` into `target` at `offset`, scaled to unit length.
 *
 * @throws EmbeddingError for non-finite components or a zero vector
 */
function writeNormalized(
  vector: ArrayLike<number>,
  target: Float32Array,
  offset: number,
  index: number
): void {
  let sumSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    const value = vector[i];
    if (value === undefined || !Number.isFinite(value)) {
      throw new EmbeddingError(`Embedding ${index} contains a non-finite value at position ${i}`);
    }
    sumSquares += value * value;
  }

  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    throw new EmbeddingError(`Embedding ${index} is a zero vector`);
  }

  for (let i = 0; i < vector.length; i++) {
    target[offset + i] = (vector[i] ?? 0) / norm;
  }
}

export class Embedder {
  private readonly provider: EmbeddingProvider;
  private readonly batchSize: number;
  private readonly logger?: Logger;
  private knownDimensions?: number;

  constructor(provider: EmbeddingProvider, options: EmbedderOptions = {}) {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new EmbeddingError(`Batch size must be a positive integer (got ${batchSize})`);
    }

    this.provider = provider;
    this.batchSize = batchSize;
    this.logger = options.logger;
    this.knownDimensions = provider.dimensions;
  }

  /** Model identifier of the underlying provider */
  get model(): string {
    return this.provider.model;
  }

  /** Vector length, once declared by the provider or seen in a result */
  get dimensions(): number | undefined {
    return this.knownDimensions;
  }

  /**
   * Embed `texts` into a `texts.length × D` matrix of unit vectors.
   *
   * @throws EmbeddingError if the provider fails, returns the wrong number of
   *   vectors, or returns a vector of the wrong length, with a non-finite
   *   value, or with zero norm
   */
  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingMatrix> {
    if (texts.length === 0) {
      return { rows: 0, dimensions: this.knownDimensions ?? 0, data: new Float32Array(0) };
    }

    let data: Float32Array | null = null;
    let dimensions = this.knownDimensions;

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const vectors = await this.callProvider(batch);

      if (vectors.length !== batch.length) {
        throw new EmbeddingError(
          `Embedding provider '${this.provider.name}' returned ${vectors.length} vector(s) for ${batch.length} input(s)`
        );
      }

      for (let j = 0; j < vectors.length; j++) {
        const vector = vectors[j];
        const index = start + j;
        if (vector === undefined) {
          throw new EmbeddingError(`Embedding ${index} is missing`);
        }

        if (dimensions === undefined) {
          if (vector.length === 0) {
            throw new EmbeddingError(`Embedding ${index} is empty`);
          }
          dimensions = vector.length;
          this.knownDimensions = dimensions;
        }
        if (vector.length !== dimensions) {
          throw new EmbeddingError(
            `Embedding ${index} has ${vector.length} dimensions, expected ${dimensions}`
          );
        }

        data ??= new Float32Array(texts.length * dimensions);
        writeNormalized(vector, data, index * dimensions, index);
      }

      const processed = Math.min(start + this.batchSize, texts.length);
      this.logger?.debug?.(`Embedded ${processed}/${texts.length}`);
      options.onProgress?.(processed, texts.length);
    }

    if (data === null || dimensions === undefined) {
      throw new EmbeddingError('Embedding provider returned no vectors');
    }

    return { rows: texts.length, dimensions, data };
  }

  /**
   * Embed a single query. Same path as a one-element `embed`, so query and
   * document vectors are directly comparable.
   */
  async embedQuery(text: string): Promise<Float32Array> {
    const matrix = await this.embed([text]);
    return matrix.data;
  }

  private async callProvider(batch: string[]): Promise<ArrayLike<number>[]> {
    try {
      return await this.provider.embedBatch(batch);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new EmbeddingError(
        `Embedding provider '${this.provider.name}' failed: ${message}`,
        error
      );
    }
  }
}

/**
 * Get row `index` of a matrix as a view (no copy).
 */
export function matrixRow(matrix: EmbeddingMatrix, index: number): Float32Array {
  const start = index * matrix.dimensions;
  return matrix.data.subarray(start, start + matrix.dimensions);
}
