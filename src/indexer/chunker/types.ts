/**
 * Chunker Types
 */

import type { Logger } from '../../utils/logger.js';

/**
 * Window size and overlap, both in characters (UTF-16 code units).
 */
export interface ChunkConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkOptions extends ChunkConfig {
  /** Receives per-document chunk counts at debug level */
  logger?: Logger;
}

/**
 * Separators tried in order, from paragraph break down to single characters.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' ', ''];
