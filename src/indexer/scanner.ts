/**
 * Document Scanner
 *
 * Enumerates the corpus with fast-glob: regular files with a configured
 * extension directly inside the docs directory (no recursion, no dotfiles),
 * read as UTF-8 and ordered by file name.
 */

import { stat, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import fg from 'fast-glob';

import { CorpusError } from '../errors/index.js';
import { DEFAULT_EXTENSIONS, type Document, type ScanOptions } from './types.js';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * List matching file names in `docsDir`, sorted by UTF-16 code units so the
 * order (and therefore chunk ids) does not depend on locale or filesystem.
 *
 * @throws CorpusError if the directory is missing or is not a directory
 */
export async function listDocumentFiles(
  docsDir: string,
  extensions: string[] = DEFAULT_EXTENSIONS
): Promise<string[]> {
  const absoluteRoot = resolve(docsDir);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(absoluteRoot)).isDirectory();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new CorpusError(`Docs directory not found: ${absoluteRoot}`);
    }
    throw new CorpusError(`Cannot access docs directory: ${absoluteRoot}`, undefined, {
      cause: error,
    });
  }
  if (!isDirectory) {
    throw new CorpusError(`Docs path is not a directory: ${absoluteRoot}`);
  }

  const patterns = extensions.map((extension) => `*.${extension}`);

  let entries: string[];
  try {
    entries = await fg(patterns, {
      cwd: absoluteRoot,
      onlyFiles: true,
      deep: 1,
      dot: false,
      followSymbolicLinks: true,
      suppressErrors: false,
    });
  } catch (error) {
    throw new CorpusError(`Cannot list docs directory: ${absoluteRoot}`, undefined, {
      cause: error,
    });
  }

  return entries.sort();
}

/**
 * Load every document in the corpus.
 *
 * @param docsDir - Corpus directory (absolute or relative path)
 * @returns Documents in file-name order; empty when no file matches
 * @throws CorpusError if the directory is missing, not a directory, or a file cannot be read
 *
 * @example
 * ```ts
 * const documents = await loadDocuments('./docs', {
 *   onFile: (doc) => console.log(`Read: ${doc.source}`),
 * });
 * ```
 */
export async function loadDocuments(
  docsDir: string,
  options: ScanOptions = {}
): Promise<Document[]> {
  const absoluteRoot = resolve(docsDir);
  const names = await listDocumentFiles(absoluteRoot, options.extensions);
  const documents: Document[] = [];

  for (const name of names) {
    let text: string;
    try {
      text = await readFile(join(absoluteRoot, name), 'utf-8');
    } catch (error) {
      throw new CorpusError(`Cannot read document: ${join(absoluteRoot, name)}`, undefined, {
        cause: error,
      });
    }

    const document: Document = { source: name, text };
    documents.push(document);
    options.onFile?.(document);
  }

  return documents;
}
