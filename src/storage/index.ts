/**
 * Storage Module
 *
 * Persists the embedding matrix and chunk metadata as two artifacts under
 * a manifest that is swapped atomically on every rebuild.
 */

export {
  writeIndex,
  readIndex,
  readManifest,
  readManifestIfExists,
  checkFieldLimits,
  createBuildId,
  type WriteIndexOptions,
  type ReadIndexOptions,
} from './store.js';
export { encodeEmbeddings, decodeEmbeddings, EMBEDDINGS_MAGIC, HEADER_BYTES } from './embeddings-file.js';
export { ManifestSchema, MetadataFileSchema, ChunkRecordSchema, type MetadataFile } from './validation.js';
export {
  MANIFEST_FILENAME,
  BUILDS_DIRNAME,
  DEFAULT_EMBEDDINGS_FILENAME,
  DEFAULT_METADATA_FILENAME,
  DEFAULT_FIELD_LIMITS,
  FORMAT_VERSION,
  type FieldLimits,
  type IndexLocation,
  type IndexManifest,
  type ChunkRecord,
  type PersistedIndex,
} from './types.js';
