/**
 * Vector Index
 *
 * Query-side view of a persisted index:
 * - Lazy loading from disk on first query, exactly once
 * - Concurrent first callers share one in-flight load
 * - A failed load is rethrown to every waiter and retried on the next call
 *
 * Once ready, the loaded artifacts are read-only and never reloaded.
 */

import type { Config } from '../config/schema.js';
import { IndexIntegrityError, ValidationError } from '../errors/index.js';
import { Embedder } from '../indexer/embedder/index.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { readIndex, type IndexManifest, type PersistedIndex } from '../storage/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { scoreRows, selectTopK } from './similarity.js';
import type { IndexState, QueryResult, VectorIndexOptions } from './types.js';

/**
 * Exact dense retriever over one persisted index.
 *
 * @example
 * ```typescript
 * const index = new VectorIndex({ dataDir: './data', embedder });
 * const results = await index.retrieve('How do I reset the thermostat?', 5);
 * ```
 */
export class VectorIndex {
  private readonly dataDir: string;
  private readonly embedder: Embedder;
  private readonly expectedModel: string;
  private readonly logger: Logger;

  private state: IndexState = 'unloaded';
  private index: PersistedIndex | null = null;

  /** In-flight load, shared by concurrent callers */
  private loading: Promise<PersistedIndex> | null = null;

  constructor(options: VectorIndexOptions) {
    this.dataDir = options.dataDir;
    this.embedder = options.embedder;
    this.expectedModel = options.expectedModel ?? options.embedder.model;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Load the index if it is not loaded yet.
   *
   * @throws IndexNotFoundError if no index has been built
   * @throws IndexIntegrityError if the artifacts are malformed or disagree
   */
  async ensureLoaded(): Promise<void> {
    await this.load();
  }

  /**
   * Return the `k` chunks most similar to `query`, best first.
   *
   * At most `min(k, N)` results; equal scores are ordered by ascending id.
   * An empty index or `k = 0` returns `[]` for any query, without embedding it.
   *
   * @throws ValidationError for a `k` that is not a non-negative integer, or a
   *   blank query against a non-empty index
   * @throws IndexNotFoundError / IndexIntegrityError if the index cannot be loaded
   * @throws EmbeddingError if the query cannot be embedded
   */
  async retrieve(query: string, k: number): Promise<QueryResult[]> {
    if (!Number.isInteger(k) || k < 0) {
      throw new ValidationError(`k must be a non-negative integer (got ${k})`);
    }

    const { matrix, rows } = await this.load();
    if (matrix.rows === 0 || k === 0) {
      return [];
    }
    if (query.trim().length === 0) {
      throw new ValidationError('Query must be a non-empty string');
    }

    const queryVector = await this.embedder.embedQuery(query);
    if (queryVector.length !== matrix.dimensions) {
      throw new IndexIntegrityError(
        `Query embedding has ${queryVector.length} dimensions but the index has ${matrix.dimensions}`
      );
    }

    const scores = scoreRows(queryVector, matrix);
    const ids = rows.map((row) => row.id);

    return selectTopK(scores, ids, k).flatMap(({ row, score }) => {
      const record = rows[row];
      return record === undefined ? [] : [{ ...record, score }];
    });
  }

  /** Current lifecycle state */
  getState(): IndexState {
    return this.state;
  }

  /** Number of chunks, or null before the index is loaded */
  getSize(): number | null {
    return this.index?.matrix.rows ?? null;
  }

  /** Manifest of the loaded index, or null before the index is loaded */
  getManifest(): IndexManifest | null {
    return this.index?.manifest ?? null;
  }

  private load(): Promise<PersistedIndex> {
    if (this.index) {
      return Promise.resolve(this.index);
    }

    // Check and set happen before any await, so concurrent callers share this promise
    if (!this.loading) {
      this.state = 'loading';
      this.loading = this.readFromDisk().then(
        (index) => {
          this.index = index;
          this.state = 'ready';
          this.loading = null;
          return index;
        },
        (error: unknown) => {
          this.state = 'unloaded';
          this.loading = null;
          throw error;
        }
      );
    }

    return this.loading;
  }

  private async readFromDisk(): Promise<PersistedIndex> {
    const startTime = performance.now();
    const index = await readIndex(this.dataDir, { expectedModel: this.expectedModel });

    this.logger.debug?.(
      `Loaded index ${index.manifest.buildId}: ${index.matrix.rows} chunk(s), ` +
        `${index.matrix.dimensions} dimensions in ${Math.round(performance.now() - startTime)}ms`
    );
    return index;
  }
}

/**
 * Create a VectorIndex for the configured data directory and model.
 */
export function createVectorIndex(
  config: Config,
  provider: EmbeddingProvider,
  logger?: Logger
): VectorIndex {
  return new VectorIndex({
    dataDir: config.paths.data_dir,
    embedder: new Embedder(provider, { batchSize: config.embedding.batch_size, logger }),
    expectedModel: config.embedding.model,
    logger,
  });
}
