/**
 * Search Types
 */

import type { Embedder } from '../indexer/embedder/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * One retrieved chunk.
 *
 * `score` is the dot product of the unit query vector and the unit chunk
 * vector, i.e. their cosine similarity, in [-1, 1].
 */
export interface QueryResult {
  id: number;
  source: string;
  text: string;
  score: number;
}

/**
 * Lifecycle of a VectorIndex. A failed load returns to `unloaded`.
 */
export type IndexState = 'unloaded' | 'loading' | 'ready';

export interface VectorIndexOptions {
  /** Directory holding the manifest */
  dataDir: string;

  /** Embeds queries; must use the model the index was built with */
  embedder: Embedder;

  /**
   * Model the manifest must record. Defaults to the embedder's model.
   */
  expectedModel?: string;

  logger?: Logger;
}

/**
 * Options for human-readable result display.
 */
export interface FormatOptions {
  /**
   * Maximum snippet length in characters.
   * @default 200
   */
  snippetLength?: number;

  /**
   * Show the score prefix.
   * @default true
   */
  showScore?: boolean;
}

/**
 * JSON shape of a result for `--json` output.
 */
export interface FormattedResultJSON {
  id: number;
  source: string;
  score: number;
  text: string;
}
