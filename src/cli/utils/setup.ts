/**
 * Shared command setup: configuration, embedding provider and index.
 */

import type { Config, PartialConfig } from '../../config/schema.js';
import { loadConfig } from '../../config/loader.js';
import { createEmbeddingProvider } from '../../indexer/embedder/index.js';
import type { EmbeddingProvider } from '../../indexer/embedder/types.js';
import { createVectorIndex, type VectorIndex } from '../../search/index.js';
import type { CommandContext } from '../types.js';

/**
 * Load the effective configuration for a command, honoring --config.
 *
 * @param overrides - Values from command flags, applied last
 */
export function loadCommandConfig(ctx: CommandContext, overrides?: PartialConfig): Config {
  const { config, configPath } = loadConfig({ configPath: ctx.options.config, overrides });

  ctx.debug(configPath ? `Config file: ${configPath}` : 'No config file; using defaults and environment');
  return config;
}

/**
 * Create the configured embedding provider. Nothing is loaded until the
 * first embedding call.
 */
export function createCommandProvider(ctx: CommandContext, config: Config): EmbeddingProvider {
  ctx.debug(`Embedding provider: ${config.embedding.provider}`);
  ctx.debug(`Embedding model: ${config.embedding.model}`);

  return createEmbeddingProvider(config.embedding);
}

/**
 * Open the persisted index for querying.
 */
export function openIndex(ctx: CommandContext, config: Config): VectorIndex {
  ctx.debug(`Data directory: ${config.paths.data_dir}`);
  return createVectorIndex(config, createCommandProvider(ctx, config), ctx);
}
