/**
 * Index Pipeline
 *
 * Orchestrates a full rebuild:
 * Scan → Chunk → Check limits → Embed → Store
 *
 * It doesn't know HOW to display progress - that's the ProgressReporter's job.
 * It just fires callbacks at the right moments. Every failure is fatal; a
 * failed build leaves the previous index current.
 */

import { resolve } from 'node:path';

import { loadDocuments } from './scanner.js';
import { chunkDocuments, validateChunkConfig } from './chunker/index.js';
import type { Embedder } from './embedder/index.js';
import type { Document, IndexingStage, IndexSummary, StageStats } from './types.js';
import { checkFieldLimits, writeIndex } from '../storage/index.js';
import { DEFAULT_FIELD_LIMITS, type FieldLimits } from '../storage/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';

/**
 * Options for building an index.
 */
export interface BuildIndexOptions {
  /** Corpus directory */
  docsDir: string;

  /** Directory holding the manifest and build generations */
  dataDir: string;

  chunkSize: number;
  chunkOverlap: number;

  /** Embedder wrapping the configured provider */
  embedder: Embedder;

  /** File extensions to include (default ['txt']) */
  extensions?: string[];

  /** Artifact names and per-row limits */
  storage?: {
    embeddingsFilename?: string;
    metadataFilename?: string;
    limits?: FieldLimits;
  };

  /** Defaults to consoleLogger (stderr) */
  logger?: Logger;

  // Progress callbacks
  onStageStart?: (stage: IndexingStage, total: number) => void;
  onProgress?: (stage: IndexingStage, processed: number, total: number, currentItem?: string) => void;
  onStageComplete?: (stage: IndexingStage, stats: StageStats) => void;
}

/**
 * Run the complete ingestion pipeline and make the new index current.
 *
 * An empty corpus is not an error: it persists an index with zero rows.
 *
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: true });
 * const embedder = new Embedder(createEmbeddingProvider(config.embedding));
 *
 * const summary = await buildIndex({
 *   docsDir: config.paths.docs_dir,
 *   dataDir: config.paths.data_dir,
 *   chunkSize: config.chunking.chunk_size,
 *   chunkOverlap: config.chunking.chunk_overlap,
 *   embedder,
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, item) => reporter.updateProgress(processed, item),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 * });
 *
 * reporter.showSummary(summary);
 * ```
 *
 * @throws ConfigurationError for invalid chunking parameters
 * @throws CorpusError if the corpus cannot be read or a chunk exceeds the field limits
 * @throws EmbeddingError if the provider fails
 */
export async function buildIndex(options: BuildIndexOptions): Promise<IndexSummary> {
  const {
    docsDir,
    dataDir,
    chunkSize,
    chunkOverlap,
    embedder,
    extensions,
    storage = {},
    logger = consoleLogger,
    onStageStart,
    onProgress,
    onStageComplete,
  } = options;
  const limits = storage.limits ?? DEFAULT_FIELD_LIMITS;

  // Bad window settings should fail before the corpus is touched
  validateChunkConfig({ chunkSize, chunkOverlap });

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<IndexingStage, number>> = {};

  function completeStage(stage: IndexingStage, startTime: number, stats: Omit<StageStats, 'stage' | 'durationMs'>) {
    const durationMs = Math.round(performance.now() - startTime);
    stageDurations[stage] = durationMs;
    onStageComplete?.(stage, { stage, durationMs, ...stats });
  }

  // =========================================================================
  // STAGE 1: SCANNING
  // =========================================================================
  const scanStartTime = performance.now();
  onStageStart?.('scanning', 0); // Unknown total at start

  let filesScanned = 0;
  const documents: Document[] = await loadDocuments(docsDir, {
    extensions,
    onFile: (document) => {
      filesScanned++;
      onProgress?.('scanning', filesScanned, 0, document.source);
    },
  });

  if (documents.length === 0) {
    logger.warn(`No documents found in ${resolve(docsDir)}; writing an empty index`);
  }
  completeStage('scanning', scanStartTime, {
    processed: documents.length,
    total: documents.length,
    details: { totalCharacters: documents.reduce((sum, doc) => sum + doc.text.length, 0) },
  });

  // =========================================================================
  // STAGE 2: CHUNKING
  // =========================================================================
  const chunkStartTime = performance.now();
  onStageStart?.('chunking', documents.length);

  const chunks = chunkDocuments(documents, { chunkSize, chunkOverlap, logger });
  onProgress?.('chunking', documents.length, documents.length);

  // Over-long fields reject the whole run before any embedding work
  checkFieldLimits(chunks, limits);

  completeStage('chunking', chunkStartTime, {
    processed: chunks.length,
    total: chunks.length,
    details: { documents: documents.length },
  });

  // =========================================================================
  // STAGE 3: EMBEDDING
  // =========================================================================
  const embedStartTime = performance.now();
  onStageStart?.('embedding', chunks.length);

  const matrix = await embedder.embed(
    chunks.map((chunk) => chunk.text),
    {
      onProgress: (processed, total) => onProgress?.('embedding', processed, total),
    }
  );

  completeStage('embedding', embedStartTime, {
    processed: matrix.rows,
    total: chunks.length,
    details: { dimensions: matrix.dimensions, model: embedder.model },
  });

  // =========================================================================
  // STAGE 4: STORING
  // =========================================================================
  const storeStartTime = performance.now();
  onStageStart?.('storing', chunks.length);

  const manifest = await writeIndex({
    dataDir,
    chunks,
    matrix,
    model: embedder.model,
    documentCount: documents.length,
    embeddingsFilename: storage.embeddingsFilename,
    metadataFilename: storage.metadataFilename,
    limits,
    logger,
  });
  onProgress?.('storing', chunks.length, chunks.length);

  completeStage('storing', storeStartTime, {
    processed: manifest.chunkCount,
    total: chunks.length,
    details: { buildId: manifest.buildId },
  });

  const summary: IndexSummary = {
    buildId: manifest.buildId,
    documentCount: manifest.documentCount,
    chunkCount: manifest.chunkCount,
    dimensions: manifest.dimensions,
    model: manifest.model,
    location: resolve(dataDir),
    durationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
  };

  logger.info(
    `Indexed ${summary.documentCount} document(s) into ${summary.chunkCount} chunk(s) (build ${summary.buildId})`
  );

  return summary;
}
