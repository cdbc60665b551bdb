/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, Embedder } from './embedder/index.js';
 *
 * const provider = createEmbeddingProvider(config.embedding);
 * const embedder = new Embedder(provider, { batchSize: config.embedding.batch_size });
 * const matrix = await embedder.embed(chunks.map((c) => c.text));
 * ```
 */

// Provider factory
export { createEmbeddingProvider, getModelDimensions } from './provider.js';
export { OllamaEmbeddingProvider, type OllamaProviderOptions } from './ollama.js';

// Embedder orchestration
export { Embedder, DEFAULT_BATCH_SIZE, matrixRow } from './embedder.js';

// Types
export type {
  EmbeddingProvider,
  EmbeddingMatrix,
  EmbedderOptions,
  EmbedOptions,
  ProviderOptions,
} from './types.js';
