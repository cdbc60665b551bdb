/**
 * Error formatting and process-exit handling for the CLI
 *
 * - Coloured text for terminals
 * - JSON for `--json`
 * - Stack traces and cause chains for `--verbose`
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show stack traces and the cause chain */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  type: string;
  code: number;
  hint?: string;
  cause?: string;
  stack?: string;
}

/**
 * Describe the `cause` of an error in one line, or undefined when absent.
 */
export function describeCause(error: Error): string | undefined {
  const { cause } = error;
  if (cause === undefined) {
    return undefined;
  }
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return String(cause);
}

/**
 * Format an error for display. Kept separate from handleError so it can be
 * tested without exiting the process.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof Error) {
    const isCli = error instanceof CLIError;
    const cause = describeCause(error);

    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        type: error.name,
        code: getExitCode(error),
        hint: isCli ? error.hint : undefined,
        cause: verbose ? cause : undefined,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (isCli && error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    if (verbose) {
      if (cause) {
        lines.push(chalk.dim('Caused by: ') + cause);
      }
      if (error.stack) {
        lines.push('');
        lines.push(chalk.dim('Stack trace:'));
        lines.push(chalk.dim(error.stack));
      }
    } else if (!isCli) {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    return lines.join('\n');
  }

  // Non-Error throwables (string, number, ...)
  if (json) {
    return JSON.stringify({ error: String(error), type: 'unknown', code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Exit code for an error: CLIError carries its own, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a handler suitable for `uncaughtException` / `unhandledRejection`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
