/**
 * Chunker Module
 *
 * Usage:
 * ```typescript
 * import { chunkDocuments } from './chunker/index.js';
 * import { loadDocuments } from '../scanner.js';
 *
 * const documents = await loadDocuments('./docs');
 * const chunks = chunkDocuments(documents, { chunkSize: 400, chunkOverlap: 50 });
 * ```
 */

export { chunkDocuments } from './chunker.js';
export { splitText, validateChunkConfig } from './splitter.js';
export { DEFAULT_SEPARATORS, type ChunkConfig, type ChunkOptions } from './types.js';
