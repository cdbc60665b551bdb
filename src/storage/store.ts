/**
 * Index Store
 *
 * Writes and reads the persisted index.
 *
 * A build is written into its own generation directory first; readers only
 * find it once the manifest is swapped to point at it (write to a temp file,
 * then rename). Readers therefore see the complete old pair or the complete
 * new pair of artifacts, never a mix.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { CorpusError, IndexIntegrityError, IndexNotFoundError } from '../errors/index.js';
import type { EmbeddingMatrix } from '../indexer/embedder/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { decodeEmbeddings, encodeEmbeddings } from './embeddings-file.js';
import {
  BUILDS_DIRNAME,
  DEFAULT_EMBEDDINGS_FILENAME,
  DEFAULT_FIELD_LIMITS,
  DEFAULT_METADATA_FILENAME,
  FORMAT_VERSION,
  MANIFEST_FILENAME,
  type ChunkRecord,
  type FieldLimits,
  type IndexLocation,
  type IndexManifest,
  type PersistedIndex,
} from './types.js';
import { ManifestSchema, MetadataFileSchema, parseArtifact, type MetadataFile } from './validation.js';

// ============================================================================
// Helpers
// ============================================================================

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sortable, unique build id such as `20261019T142501Z-3f9a1c2e`.
 */
export function createBuildId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
  return `${stamp}-${randomUUID().slice(0, 8)}`;
}

/**
 * Reject chunk fields that exceed the persisted limits. Nothing is truncated.
 *
 * @throws CorpusError naming the first offending chunk
 */
export function checkFieldLimits(chunks: ChunkRecord[], limits: FieldLimits): void {
  for (const chunk of chunks) {
    if (chunk.source.length > limits.maxSourceLength) {
      throw new CorpusError(
        `Source name is ${chunk.source.length} characters, limit is ${limits.maxSourceLength}: ${chunk.source.slice(0, 40)}...`,
        'Rename the file or raise storage.max_source_length'
      );
    }
    if (chunk.text.length > limits.maxTextLength) {
      throw new CorpusError(
        `Chunk ${chunk.id} of ${chunk.source} is ${chunk.text.length} characters, limit is ${limits.maxTextLength}`,
        'Lower chunking.chunk_size or raise storage.max_text_length'
      );
    }
  }
}

// ============================================================================
// Reading
// ============================================================================

/**
 * Read and validate the manifest.
 *
 * @throws IndexNotFoundError if no index has been built in `dataDir`
 * @throws IndexIntegrityError if the manifest is malformed
 */
export async function readManifest(dataDir: string): Promise<IndexManifest> {
  const manifestPath = join(dataDir, MANIFEST_FILENAME);

  let content: string;
  try {
    content = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new IndexNotFoundError(manifestPath);
    }
    throw new IndexIntegrityError(`Cannot read ${manifestPath}: ${describe(error)}`, undefined, {
      cause: error,
    });
  }

  return parseArtifact(ManifestSchema, content, manifestPath);
}

/**
 * Read the manifest if present; null when no index has been built.
 */
export async function readManifestIfExists(dataDir: string): Promise<IndexManifest | null> {
  try {
    return await readManifest(dataDir);
  } catch (error) {
    if (error instanceof IndexNotFoundError) {
      return null;
    }
    throw error;
  }
}

async function readArtifact(path: string, what: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    if (isNotFound(error)) {
      throw new IndexNotFoundError(path, what);
    }
    throw new IndexIntegrityError(`Cannot read ${path}: ${describe(error)}`, undefined, {
      cause: error,
    });
  }
}

export interface ReadIndexOptions {
  /**
   * Model the caller will embed queries with. A different model in the
   * manifest is an IndexIntegrityError, since the vectors are not comparable.
   */
  expectedModel?: string;
}

/**
 * Load the current index and check that its parts agree.
 *
 * @throws IndexNotFoundError if the manifest or an artifact is missing
 * @throws IndexIntegrityError if any artifact is malformed, the row counts or
 *   dimensions disagree, or the index was built with a different model
 */
export async function readIndex(
  dataDir: string,
  options: ReadIndexOptions = {}
): Promise<PersistedIndex> {
  const manifest = await readManifest(dataDir);

  if (options.expectedModel !== undefined && manifest.model !== options.expectedModel) {
    throw new IndexIntegrityError(
      `Index was built with embedding model '${manifest.model}', but '${options.expectedModel}' is configured`,
      `Rebuild the index (ragdex ingest) or set embedding.model = "${manifest.model}"`
    );
  }

  const embeddingsPath = join(dataDir, manifest.embeddingsFile);
  const metadataPath = join(dataDir, manifest.metadataFile);

  const [embeddingsBuffer, metadataBuffer] = await Promise.all([
    readArtifact(embeddingsPath, 'Embedding artifact'),
    readArtifact(metadataPath, 'Metadata artifact'),
  ]);

  const matrix = decodeEmbeddings(embeddingsBuffer, embeddingsPath);
  const metadata = parseArtifact(MetadataFileSchema, metadataBuffer.toString('utf-8'), metadataPath);

  if (matrix.rows !== metadata.rows.length) {
    throw new IndexIntegrityError(
      `Index artifacts disagree: ${matrix.rows} embedding row(s) but ${metadata.rows.length} metadata row(s)`
    );
  }
  if (manifest.chunkCount !== matrix.rows) {
    throw new IndexIntegrityError(
      `Manifest lists ${manifest.chunkCount} chunk(s) but the artifacts hold ${matrix.rows}`
    );
  }
  if (manifest.dimensions !== matrix.dimensions) {
    throw new IndexIntegrityError(
      `Manifest lists ${manifest.dimensions} dimensions but the embedding artifact has ${matrix.dimensions}`
    );
  }

  return { manifest, matrix, rows: metadata.rows };
}

// ============================================================================
// Writing
// ============================================================================

export interface WriteIndexOptions extends IndexLocation {
  chunks: ChunkRecord[];
  matrix: EmbeddingMatrix;
  model: string;
  documentCount: number;
  limits?: FieldLimits;
  logger?: Logger;
  /** Override the generated build id (tests) */
  buildId?: string;
}

/**
 * Remove every generation except those in `keep`. Failures are warnings.
 */
async function pruneGenerations(
  buildsDir: string,
  keep: Set<string>,
  logger: Logger
): Promise<void> {
  let entries: string[];
  try {
    entries = await readdir(buildsDir);
  } catch (error) {
    logger.warn(`Could not list old index builds in ${buildsDir}: ${describe(error)}`);
    return;
  }

  for (const entry of entries) {
    if (keep.has(entry)) {
      continue;
    }
    try {
      await rm(join(buildsDir, entry), { recursive: true, force: true });
      logger.debug?.(`Pruned old index build ${entry}`);
    } catch (error) {
      logger.warn(`Could not remove old index build ${entry}: ${describe(error)}`);
    }
  }
}

/**
 * Persist a new index generation and make it current.
 *
 * On failure before the manifest swap the new generation is removed and the
 * previous index stays current. After the swap, generations other than the
 * new one and the one it replaced are pruned.
 *
 * @returns The manifest now in effect
 * @throws CorpusError if a chunk exceeds the field limits
 * @throws IndexIntegrityError if `chunks` and `matrix` disagree in length
 */
export async function writeIndex(options: WriteIndexOptions): Promise<IndexManifest> {
  const {
    dataDir,
    chunks,
    matrix,
    model,
    documentCount,
    embeddingsFilename = DEFAULT_EMBEDDINGS_FILENAME,
    metadataFilename = DEFAULT_METADATA_FILENAME,
    limits = DEFAULT_FIELD_LIMITS,
    logger = silentLogger,
  } = options;

  if (chunks.length !== matrix.rows) {
    throw new IndexIntegrityError(
      `Cannot write index: ${chunks.length} chunk(s) but ${matrix.rows} embedding row(s)`
    );
  }
  checkFieldLimits(chunks, limits);

  // The generation being replaced is kept so a reader that already resolved
  // the old manifest can finish loading it. An unreadable old manifest is
  // simply replaced.
  let previousBuildId: string | null = null;
  try {
    previousBuildId = (await readManifestIfExists(dataDir))?.buildId ?? null;
  } catch (error) {
    logger.warn(`Replacing unreadable index manifest: ${describe(error)}`);
  }

  const buildId = options.buildId ?? createBuildId();
  const buildsDir = join(dataDir, BUILDS_DIRNAME);
  const buildDir = join(buildsDir, buildId);
  const manifestPath = join(dataDir, MANIFEST_FILENAME);
  const tempManifestPath = `${manifestPath}.${buildId}.tmp`;

  const manifest: IndexManifest = {
    formatVersion: FORMAT_VERSION,
    buildId,
    createdAt: new Date().toISOString(),
    model,
    dimensions: matrix.dimensions,
    documentCount,
    chunkCount: chunks.length,
    embeddingsFile: `${BUILDS_DIRNAME}/${buildId}/${embeddingsFilename}`,
    metadataFile: `${BUILDS_DIRNAME}/${buildId}/${metadataFilename}`,
  };

  const metadata: MetadataFile = {
    formatVersion: FORMAT_VERSION,
    maxSourceLength: limits.maxSourceLength,
    maxTextLength: limits.maxTextLength,
    rows: chunks.map(({ id, source, text }) => ({ id, source, text })),
  };

  try {
    await mkdir(buildDir, { recursive: true });
    await writeFile(join(buildDir, embeddingsFilename), encodeEmbeddings(matrix));
    await writeFile(join(buildDir, metadataFilename), JSON.stringify(metadata), 'utf-8');
    await writeFile(tempManifestPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
    await rename(tempManifestPath, manifestPath);
  } catch (error) {
    await rm(buildDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
      logger.warn(`Could not remove incomplete build ${buildDir}: ${describe(cleanupError)}`);
    });
    await rm(tempManifestPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn(`Could not remove ${tempManifestPath}: ${describe(cleanupError)}`);
    });
    throw error;
  }

  logger.debug?.(`Index build ${buildId} is now current`);

  const keep = new Set([buildId]);
  if (previousBuildId !== null) {
    keep.add(previousBuildId);
  }
  await pruneGenerations(buildsDir, keep, logger);

  return manifest;
}
