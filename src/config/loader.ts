/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Locate ragdex.toml (see paths.ts)
 * 2. Parse it with @iarna/toml and validate the sparse shape
 * 3. Merge defaults <- file <- environment <- overrides
 * 4. Validate the merged result, including cross-field rules
 * 5. Resolve relative directories against the config file's directory
 *
 * Directories set in the environment are relative to the working directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { z } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { envToPartialConfig, loadEnv, type EnvVars } from './env.js';
import { resolveConfigLocation } from './paths.js';
import { ConfigurationError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Explicit config file (--config) */
  configPath?: string;
  /** Environment overrides; defaults to the cached process environment */
  env?: EnvVars;
  /** Directory used to find ragdex.toml and resolve relative paths */
  cwd?: string;
  /** Highest-priority layer, e.g. command-line flags */
  overrides?: PartialConfig;
}

export interface LoadedConfig {
  config: Config;
  /** Config file that was read, or null when only defaults and env applied */
  configPath: string | null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Undefined source values leave the target untouched.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigurationError(
      `Invalid TOML in config file: ${message}`,
      [],
      `Fix the syntax in ${configPath} or regenerate it: ragdex config init --force`
    );
  }

  // Validate against the partial schema (allows missing fields)
  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigurationError(
      `Invalid configuration in ${configPath}:`,
      formatIssues(validationResult.error)
    );
  }

  return validationResult.data;
}

/**
 * Anchor the environment's directories to the working directory before the
 * merge, so the later config-file resolution leaves them alone.
 */
function resolveEnvPaths(layer: PartialConfig, cwd: string): PartialConfig {
  const fromCwd = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(cwd, value);

  return {
    ...layer,
    paths: {
      docs_dir: fromCwd(layer.paths?.docs_dir),
      data_dir: fromCwd(layer.paths?.data_dir),
    },
  };
}

/**
 * Load the effective configuration.
 *
 * @throws ConfigurationError if the file is unreadable TOML, a value has the
 *   wrong type, or the merged settings break a cross-field rule
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? loadEnv();
  const location = resolveConfigLocation(options.configPath, env.RAGDEX_CONFIG, cwd);

  let fileLayer: Record<string, unknown> = {};
  let configPath: string | null = null;

  if (fs.existsSync(location.path)) {
    fileLayer = readConfigFile(location.path);
    configPath = location.path;
  } else if (location.explicit) {
    throw new ConfigurationError(
      `Config file not found: ${location.path}`,
      [],
      'Check the --config path, or create one with: ragdex config init'
    );
  }

  const merged = deepMerge(
    deepMerge(deepMerge(DEFAULT_CONFIG, fileLayer), resolveEnvPaths(envToPartialConfig(env), cwd)),
    options.overrides ?? {}
  );
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigurationError('Invalid configuration:', formatIssues(result.error));
  }

  const baseDir = configPath !== null ? path.dirname(configPath) : cwd;
  const config = result.data;

  return {
    config: {
      ...config,
      paths: {
        docs_dir: path.resolve(baseDir, config.paths.docs_dir),
        data_dir: path.resolve(baseDir, config.paths.data_dir),
      },
    },
    configPath,
  };
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue(config, 'embedding.model') => 'all-minilm'
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * List all config values in a flat format
 * Returns entries like ['search.top_k', 5]
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}

/**
 * Write the commented default config file.
 *
 * @throws ConfigurationError if the file exists and force is not set
 */
export function writeConfigTemplate(configPath: string, force = false): void {
  if (fs.existsSync(configPath) && !force) {
    throw new ConfigurationError(
      `Config file already exists: ${configPath}`,
      [],
      'Use --force to overwrite it'
    );
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
}
