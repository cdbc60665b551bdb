/**
 * Search Result Formatter
 *
 * Two audiences:
 * - `formatContext` renders results as the plain-text block handed to a
 *   text-generation model
 * - `formatResult(s)` and `formatResultsJSON` render results for the CLI
 *
 * @example
 * ```typescript
 * formatContext(results);
 * // [Source: a.txt | Score: 0.873]
 * // The thermostat resets after 10 seconds of no input.
 *
 * formatResult(results[0]);
 * // [0.873] a.txt #4
 * //   The thermostat resets after 10 seconds of no input.
 * ```
 *
 * @packageDocumentation
 */

import type { FormatOptions, FormattedResultJSON, QueryResult } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a similarity score with three decimals.
 *
 * @example
 * ```typescript
 * formatScore(0.87312)  // "0.873"
 * formatScore(1)        // "1.000"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(3);
}

/**
 * Truncate content to a maximum length with ellipsis.
 *
 * Newlines and runs of whitespace collapse to single spaces so the snippet
 * fits on one line.
 *
 * @example
 * ```typescript
 * truncateSnippet("Hello world", 5)
 * // "Hello..."
 *
 * truncateSnippet("Line 1\nLine 2", 20)
 * // "Line 1 Line 2"
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

// ============================================================================
// Model Context
// ============================================================================

/**
 * Render results as context for a generation model.
 *
 * One block per result, in the given order, separated by a blank line:
 * ```
 * [Source: <source> | Score: <score>]
 * <text>
 * ```
 * Text is passed through unchanged. Empty input gives `""`.
 */
export function formatContext(results: QueryResult[]): string {
  return results
    .map((result) => `[Source: ${result.source} | Score: ${formatScore(result.score)}]\n${result.text}`)
    .join('\n\n');
}

// ============================================================================
// Text Formatting Functions
// ============================================================================

/**
 * Format a single result for CLI display.
 *
 * Output format:
 * ```
 * [0.873] a.txt #4
 *   The thermostat resets after 10 seconds of no input.
 * ```
 */
export function formatResult(result: QueryResult, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;

  const parts: string[] = [];
  if (showScore) {
    parts.push(`[${formatScore(result.score)}]`);
  }
  parts.push(`${result.source} #${result.id}`);

  return `${parts.join(' ')}\n${SNIPPET_INDENT}${truncateSnippet(result.text, snippetLength)}`;
}

/**
 * Format multiple results for CLI display, separated by blank lines.
 */
export function formatResults(results: QueryResult[], options: FormatOptions = {}): string {
  if (results.length === 0) {
    return '';
  }

  return results.map((result) => formatResult(result, options)).join('\n\n');
}

// ============================================================================
// JSON Formatting Functions
// ============================================================================

/**
 * Format results as a JSON-serializable array for tools like jq.
 */
export function formatResultsJSON(results: QueryResult[]): FormattedResultJSON[] {
  return results.map(({ id, source, score, text }) => ({ id, source, score, text }));
}
