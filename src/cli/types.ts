import type { Logger } from '../utils/logger.js';

/**
 * Global CLI options available to all commands
 * These are parsed at the root level and passed down to subcommands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Output results as JSON instead of human-readable text */
  json: boolean;
  /** Explicit config file (--config) */
  config?: string;
}

/**
 * Context passed to all command handlers
 * Combines parsed options with runtime utilities. Satisfies Logger, so it
 * can be handed straight to library code.
 */
export interface CommandContext extends Logger {
  options: GlobalOptions;
  /** Print a result line to stdout (suppressed with --json) */
  log: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
  /** Log an error message */
  error: (message: string) => void;
}
