/**
 * Ingestion Module
 *
 * Reads the corpus, chunks it, embeds every chunk and persists a new index.
 *
 * @example
 * ```ts
 * import { buildIndex, Embedder, createEmbeddingProvider } from './indexer/index.js';
 *
 * const summary = await buildIndex({
 *   docsDir: './docs',
 *   dataDir: './data',
 *   chunkSize: 400,
 *   chunkOverlap: 50,
 *   embedder: new Embedder(createEmbeddingProvider(config.embedding)),
 * });
 *
 * console.log(`Indexed ${summary.chunkCount} chunks`);
 * ```
 */

// Corpus loading
export { loadDocuments, listDocumentFiles } from './scanner.js';

// Types and constants
export {
  type Document,
  type Chunk,
  type ScanOptions,
  type IndexingStage,
  type StageStats,
  type IndexSummary,
  DEFAULT_EXTENSIONS,
} from './types.js';

// Chunker module
export {
  chunkDocuments,
  splitText,
  validateChunkConfig,
  DEFAULT_SEPARATORS,
  type ChunkConfig,
  type ChunkOptions,
} from './chunker/index.js';

// Embedder module
export {
  createEmbeddingProvider,
  getModelDimensions,
  OllamaEmbeddingProvider,
  Embedder,
  DEFAULT_BATCH_SIZE,
  matrixRow,
  type EmbeddingProvider,
  type EmbeddingMatrix,
  type EmbedderOptions,
  type EmbedOptions,
  type ProviderOptions,
} from './embedder/index.js';

// Pipeline orchestration
export { buildIndex, type BuildIndexOptions } from './pipeline.js';
