/**
 * Config file location
 *
 * Resolution order:
 * 1. --config <path> on the command line
 * 2. RAGDEX_CONFIG
 * 3. ./ragdex.toml in the working directory
 */

import { resolve } from 'node:path';

export const CONFIG_FILENAME = 'ragdex.toml';

export interface ConfigLocation {
  /** Absolute path to the config file */
  path: string;
  /** True when the user named the file, so a missing file is an error */
  explicit: boolean;
}

export function resolveConfigLocation(
  explicitPath: string | undefined,
  envPath: string | undefined,
  cwd: string = process.cwd()
): ConfigLocation {
  const named = explicitPath ?? envPath;
  if (named !== undefined) {
    return { path: resolve(cwd, named), explicit: true };
  }
  return { path: resolve(cwd, CONFIG_FILENAME), explicit: false };
}
