/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `ragdex config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  ConfigObjectSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  EmbeddingProviderTypeSchema,
  SearchConfigSchema,
  StorageConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  EmbeddingConfig,
  EmbeddingProviderType,
  StorageConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  deepMerge,
  getConfigValue,
  listConfig,
  writeConfigTemplate,
  type LoadConfigOptions,
  type LoadedConfig,
} from './loader.js';

export { CONFIG_FILENAME, resolveConfigLocation, type ConfigLocation } from './paths.js';

// Environment variables
export {
  loadEnv,
  parseEnv,
  getOllamaHost,
  envToPartialConfig,
  EnvSchema,
  DEFAULT_OLLAMA_HOST,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
