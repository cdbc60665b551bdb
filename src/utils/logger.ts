/**
 * Logger Interface for Library Code
 *
 * Library code (chunker, pipeline, index store) accepts a Logger via
 * dependency injection:
 * - CLI code passes its CommandContext (which satisfies Logger)
 * - Tests pass silentLogger or a vi.fn()-backed mock
 * - Direct library users get consoleLogger by default
 */

import chalk from 'chalk';

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log an informational message */
  info: (message: string) => void;
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

type Level = 'INFO' | 'WARN' | 'DEBUG';

const LEVEL_COLORS: Record<Level, (text: string) => string> = {
  INFO: chalk.blue,
  WARN: chalk.yellow,
  DEBUG: chalk.gray,
};

/**
 * Render one log line as `HH:mm:ss | LEVEL | message`.
 */
export function formatLogLine(level: Level, message: string, now: Date = new Date()): string {
  const time = now.toTimeString().slice(0, 8);
  return `${chalk.dim(time)} | ${LEVEL_COLORS[level](level.padEnd(5))} | ${message}`;
}

/**
 * Create a logger that writes to stderr, so stdout stays free for results.
 */
export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  const write = (level: Level, message: string) => {
    process.stderr.write(formatLogLine(level, message) + '\n');
  };

  return {
    info: (message) => write('INFO', message),
    warn: (message) => write('WARN', message),
    debug: options.debug ? (message) => write('DEBUG', message) : undefined,
  };
}

/**
 * Default logger for use when none is injected.
 */
export const consoleLogger: Logger = createConsoleLogger();

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};
