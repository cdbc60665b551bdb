/**
 * Ingestion Types
 *
 * Documents and chunks exist only while an index is being built; the
 * persisted form lives in ../storage/types.ts.
 */

/**
 * One corpus file.
 */
export interface Document {
  /** File name, used as the citation label */
  source: string;

  /** Full UTF-8 contents */
  text: string;
}

/**
 * A bounded window of one document's text.
 *
 * `id` is sequential across the whole corpus in document order, starting
 * at 0. Ids are replaced wholesale by every rebuild.
 */
export interface Chunk {
  id: number;
  source: string;
  /** Trimmed and never empty */
  text: string;
}

/**
 * Options for loading the corpus.
 */
export interface ScanOptions {
  /**
   * File extensions to include (without the dot).
   * @default ['txt']
   */
  extensions?: string[];

  /** Called for each document as it is read */
  onFile?: (document: Document) => void;
}

export const DEFAULT_EXTENSIONS = ['txt'];

/**
 * Stages of an index build, in the order they run.
 */
export type IndexingStage = 'scanning' | 'chunking' | 'embedding' | 'storing';

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: IndexingStage;

  /** Number of items processed */
  processed: number;

  /** Total items in this stage */
  total: number;

  /** Time taken in milliseconds */
  durationMs: number;

  /** Additional stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * Result of a successful build.
 */
export interface IndexSummary {
  buildId: string;
  documentCount: number;
  chunkCount: number;
  dimensions: number;
  model: string;

  /** Absolute data directory holding the manifest */
  location: string;

  /** Wall time of the whole build */
  durationMs: number;

  /** Time breakdown by stage */
  stageDurations: Partial<Record<IndexingStage, number>>;
}
