/**
 * Command context factory
 *
 * Results go to stdout; diagnostics go to stderr through the shared log
 * line format, so `ragdex context ... | llm` pipes only the context.
 */

import chalk from 'chalk';

import { formatLogLine } from '../utils/logger.js';
import type { CommandContext, GlobalOptions } from './types.js';

export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    info: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(formatLogLine('INFO', message));
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(formatLogLine('DEBUG', message));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.error(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}
