/**
 * Persisted Index Types
 *
 * On disk, under the data directory:
 *
 * ```
 * <data_dir>/
 * ├── index.json                      (manifest: points at the current build)
 * └── builds/
 *     └── <buildId>/
 *         ├── chunks_embeddings.f32   (N x D float32 matrix)
 *         └── chunks_meta.json        (N rows of id, source, text)
 * ```
 *
 * Row i of the matrix and row i of the metadata describe the same chunk.
 */

import type { EmbeddingMatrix } from '../indexer/embedder/types.js';
import type { IndexManifest, ChunkRecord } from './validation.js';

export type { IndexManifest, ChunkRecord };

export const MANIFEST_FILENAME = 'index.json';
export const BUILDS_DIRNAME = 'builds';
export const DEFAULT_EMBEDDINGS_FILENAME = 'chunks_embeddings.f32';
export const DEFAULT_METADATA_FILENAME = 'chunks_meta.json';
export const FORMAT_VERSION = 1;

/**
 * Per-row field limits, recorded in the metadata artifact.
 */
export interface FieldLimits {
  maxSourceLength: number;
  maxTextLength: number;
}

export const DEFAULT_FIELD_LIMITS: FieldLimits = {
  maxSourceLength: 128,
  maxTextLength: 4000,
};

/**
 * Where an index lives and what its artifacts are called.
 */
export interface IndexLocation {
  dataDir: string;
  embeddingsFilename?: string;
  metadataFilename?: string;
}

/**
 * A fully loaded and validated index.
 */
export interface PersistedIndex {
  manifest: IndexManifest;
  matrix: EmbeddingMatrix;
  rows: ChunkRecord[];
}
