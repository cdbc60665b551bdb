/**
 * Chunker
 *
 * Turns documents into one running sequence of chunks with corpus-wide ids.
 */

import type { Chunk, Document } from '../types.js';
import { splitText, validateChunkConfig } from './splitter.js';
import type { ChunkOptions } from './types.js';

/**
 * Chunk every document in order.
 *
 * Ids start at 0 and increase by one across document boundaries, so the
 * first chunk of the second document follows the last chunk of the first.
 *
 * @throws ConfigurationError for invalid window settings, before any text is split
 */
export function chunkDocuments(documents: Document[], options: ChunkOptions): Chunk[] {
  const { chunkSize, chunkOverlap, logger } = options;
  validateChunkConfig({ chunkSize, chunkOverlap });

  const chunks: Chunk[] = [];

  for (const document of documents) {
    const windows = splitText(document.text, chunkSize, chunkOverlap);
    logger?.debug?.(`${document.source}: ${windows.length} chunk(s)`);

    for (const text of windows) {
      chunks.push({ id: chunks.length, source: document.source, text });
    }
  }

  return chunks;
}
