/**
 * ragdex - Library Entry Point
 *
 * The CLI (`ragdex`) covers the common workflow:
 * ```bash
 * ragdex ingest                              # Build the index from docs/
 * ragdex search "thermostat reset"           # Show the closest chunks
 * ragdex context "How do I reset it?"        # Print context for a model
 * ```
 *
 * The same pieces are exported here for embedding retrieval in another
 * program.
 *
 * @example Build and query an index
 * ```typescript
 * import { buildIndex, createEmbeddingProvider, createVectorIndex, Embedder, formatContext, loadConfig } from 'ragdex';
 *
 * const { config } = loadConfig();
 * const provider = createEmbeddingProvider(config.embedding);
 *
 * await buildIndex({
 *   docsDir: config.paths.docs_dir,
 *   dataDir: config.paths.data_dir,
 *   chunkSize: config.chunking.chunk_size,
 *   chunkOverlap: config.chunking.chunk_overlap,
 *   embedder: new Embedder(provider),
 * });
 *
 * const index = createVectorIndex(config, provider);
 * console.log(formatContext(await index.retrieve('How long until the thermostat resets?', 3)));
 * ```
 *
 * @packageDocumentation
 */

// Ingestion
export {
  buildIndex,
  chunkDocuments,
  splitText,
  loadDocuments,
  createEmbeddingProvider,
  Embedder,
  OllamaEmbeddingProvider,
  type BuildIndexOptions,
  type Document,
  type Chunk,
  type IndexSummary,
  type IndexingStage,
  type StageStats,
  type EmbeddingProvider,
  type EmbeddingMatrix,
} from './indexer/index.js';

// Retrieval
export {
  VectorIndex,
  createVectorIndex,
  formatContext,
  formatResults,
  formatResultsJSON,
  type QueryResult,
  type IndexState,
  type VectorIndexOptions,
} from './search/index.js';

// Prompting
export { buildPrompt, type PromptOptions } from './agent/index.js';

// Persistence
export {
  readIndex,
  readManifestIfExists,
  writeIndex,
  type IndexManifest,
  type ChunkRecord,
  type PersistedIndex,
} from './storage/index.js';

// Configuration
export { loadConfig, DEFAULT_CONFIG, type Config, type PartialConfig } from './config/index.js';

// Errors
export {
  CLIError,
  ValidationError,
  ConfigurationError,
  CorpusError,
  EmbeddingError,
  IndexNotFoundError,
  IndexIntegrityError,
} from './errors/index.js';

// Logging
export { createConsoleLogger, consoleLogger, silentLogger, type Logger } from './utils/logger.js';
