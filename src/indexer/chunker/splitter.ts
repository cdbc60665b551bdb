/**
 * Recursive Text Splitter
 *
 * Breaks text on the coarsest separator present (paragraph, line, sentence,
 * word, character), recursing into pieces that are still too long, then
 * merges the resulting pieces greedily into windows of at most `chunkSize`
 * characters. When a window is emitted, pieces are dropped from its front
 * until no more than `chunkOverlap` characters remain; those seed the next
 * window. If no whole piece fits, the trailing words of the window do.
 */

import { ConfigurationError } from '../../errors/index.js';
import { DEFAULT_SEPARATORS, type ChunkConfig } from './types.js';

/**
 * Reject window settings that cannot make progress.
 *
 * @throws ConfigurationError unless both are integers and chunkSize > chunkOverlap >= 0
 */
export function validateChunkConfig({ chunkSize, chunkOverlap }: ChunkConfig): void {
  const issues: string[] = [];

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    issues.push(`chunk_size: must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    issues.push(`chunk_overlap: must be a non-negative integer (got ${chunkOverlap})`);
  }
  if (issues.length === 0 && chunkOverlap >= chunkSize) {
    issues.push(
      `chunk_overlap: must be less than chunk_size (got ${chunkOverlap} >= ${chunkSize})`
    );
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid chunking parameters:', issues);
  }
}

/**
 * Split on `separator`, keeping it attached to the end of each piece.
 * The empty separator splits into individual code points.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === '') {
    return Array.from(text);
  }

  const pieces: string[] = [];
  let start = 0;
  let index = text.indexOf(separator, start);

  while (index !== -1) {
    pieces.push(text.slice(start, index + separator.length));
    start = index + separator.length;
    index = text.indexOf(separator, start);
  }
  if (start < text.length) {
    pieces.push(text.slice(start));
  }

  return pieces;
}

/**
 * Join the pieces of one window. Returns null when only whitespace remains.
 */
function joinWindow(pieces: string[]): string | null {
  const text = pieces.join('').trim();
  return text === '' ? null : text;
}

/**
 * Longest word-aligned suffix of `text` that is at most `maxLength`
 * characters and holds something besides whitespace. Null when no word fits.
 */
function trailingWords(text: string, maxLength: number): string | null {
  for (let start = Math.max(1, text.length - maxLength); start < text.length; start++) {
    const char = text.charAt(start);
    if (/\s/.test(char) || !/\s/.test(text.charAt(start - 1))) {
      continue;
    }
    return text.slice(start);
  }
  return null;
}

/**
 * Greedily merge pieces (each shorter than chunkSize) into windows.
 */
function mergePieces(pieces: string[], { chunkSize, chunkOverlap }: ChunkConfig): string[] {
  const windows: string[] = [];
  let current: string[] = [];
  let total = 0;

  for (const piece of pieces) {
    const length = piece.length;

    if (total + length > chunkSize && current.length > 0) {
      const emitted = current.join('');
      const window = joinWindow(current);
      if (window !== null) {
        windows.push(window);
      }

      // Keep a tail of at most chunkOverlap characters that still leaves
      // room for the incoming piece.
      while (total > chunkOverlap || (total + length > chunkSize && total > 0)) {
        const dropped = current.shift();
        if (dropped === undefined) {
          break;
        }
        total -= dropped.length;
      }

      if (chunkOverlap > 0 && window !== null && joinWindow(current) === null) {
        const tail = trailingWords(emitted, Math.min(chunkOverlap, chunkSize - length));
        current = tail === null ? [] : [tail];
        total = tail === null ? 0 : tail.length;
      }
    }

    current.push(piece);
    total += length;
  }

  const last = joinWindow(current);
  if (last !== null) {
    windows.push(last);
  }

  return windows;
}

/**
 * Break text into pieces shorter than chunkSize, using the coarsest
 * separator it contains and finer ones for pieces that are still too long.
 * The last separator level ('') yields single code points.
 */
function collectPieces(
  text: string,
  separators: readonly string[],
  config: ChunkConfig
): string[] {
  // First separator that occurs in the text; '' always matches
  let separator = '';
  let remaining: readonly string[] = [];
  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i];
    if (candidate === undefined || candidate === '') {
      break;
    }
    if (text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const pieces: string[] = [];
  for (const piece of splitKeepingSeparator(text, separator)) {
    if (piece.length < config.chunkSize || remaining.length === 0) {
      pieces.push(piece);
    } else {
      pieces.push(...collectPieces(piece, remaining, config));
    }
  }

  return pieces;
}

/**
 * Split text into ordered, trimmed, non-empty windows.
 *
 * Every window is at most `chunkSize` characters. With a positive
 * `chunkOverlap`, each window repeats between 1 and `chunkOverlap`
 * characters from the end of the one before it, unless not even one
 * trailing word of that window fits beside the next piece. Text shorter
 * than `chunkSize` yields one window; whitespace-only text yields none.
 *
 * @throws ConfigurationError for invalid window settings
 */
export function splitText(
  text: string,
  chunkSize: number,
  chunkOverlap: number,
  separators: readonly string[] = DEFAULT_SEPARATORS
): string[] {
  const config = { chunkSize, chunkOverlap };
  validateChunkConfig(config);

  if (text.trim() === '') {
    return [];
  }

  return mergePieces(collectPieces(text, separators, config), config);
}
