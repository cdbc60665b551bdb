/**
 * Embedding Provider Factory
 *
 * Creates embedding providers from the [embedding] config section.
 * The only backend is a running Ollama server (OLLAMA_HOST).
 */

import type { EmbeddingConfig } from '../../config/schema.js';
import { getOllamaHost } from '../../config/env.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import type { EmbeddingProvider, ProviderOptions } from './types.js';

/**
 * Known output sizes, matched by substring of the lower-cased model name.
 */
const MODEL_DIMENSIONS: Array<[string, number]> = [
  ['all-minilm', 384],
  ['paraphrase-minilm', 384],
  ['bge-small', 384],
  ['bge-base', 768],
  ['bge-large', 1024],
  ['all-mpnet-base', 768],
  ['nomic-embed', 768],
  ['mxbai-embed-large', 1024],
];

/**
 * Get the expected embedding dimensions for a model, or undefined when the
 * model is not in the table (the size is then learned from the first batch).
 */
export function getModelDimensions(model: string): number | undefined {
  const normalized = model.toLowerCase();
  for (const [pattern, dimensions] of MODEL_DIMENSIONS) {
    if (normalized.includes(pattern)) {
      return dimensions;
    }
  }
  return undefined;
}

/**
 * Create an embedding provider from configuration.
 *
 * Nothing is contacted here; the server is first called by embedBatch.
 *
 * @example
 * ```typescript
 * const { config } = loadConfig();
 * const provider = createEmbeddingProvider(config.embedding);
 * const embedder = new Embedder(provider, { batchSize: config.embedding.batch_size });
 * ```
 */
export function createEmbeddingProvider(
  config: EmbeddingConfig,
  options: ProviderOptions = {}
): EmbeddingProvider {
  const dimensions = getModelDimensions(config.model);

  switch (config.provider) {
    case 'ollama':
      return new OllamaEmbeddingProvider({
        model: config.model,
        dimensions,
        host: options.ollamaHost ?? getOllamaHost(),
        fetch: options.fetch,
      });
  }
}
