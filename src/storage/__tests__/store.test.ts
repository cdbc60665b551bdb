/**
 * Index Store Tests
 *
 * Each test writes into a fresh temporary data directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmSync,
  truncateSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';

import {
  ChunkRecordSchema,
  checkFieldLimits,
  createBuildId,
  encodeEmbeddings,
  readIndex,
  readManifest,
  readManifestIfExists,
  writeIndex,
  type ChunkRecord,
} from '../index.js';
import { CorpusError, IndexIntegrityError, IndexNotFoundError } from '../../errors/index.js';
import type { EmbeddingMatrix } from '../../indexer/embedder/types.js';
import { createTempWorkspace, type TempWorkspace } from '../../test-utils/index.js';

const CHUNKS: ChunkRecord[] = [
  { id: 0, source: 'a.txt', text: 'alpha' },
  { id: 1, source: 'a.txt', text: 'beta' },
  { id: 2, source: 'b.txt', text: 'gamma' },
];

const MATRIX: EmbeddingMatrix = {
  rows: 3,
  dimensions: 2,
  data: Float32Array.from([1, 0, 0, 1, 0.6, 0.8]),
};

function makeChunks(count: number): ChunkRecord[] {
  return Array.from({ length: count }, (_, id) => ({ id, source: 'doc.txt', text: `chunk ${id}` }));
}

function makeMatrix(rows: number, dimensions = 2): EmbeddingMatrix {
  const data = new Float32Array(rows * dimensions);
  for (let i = 0; i < rows; i++) data[i * dimensions] = 1;
  return { rows, dimensions, data };
}

describe('Index Store', () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = createTempWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  function write(overrides: Partial<Parameters<typeof writeIndex>[0]> = {}) {
    return writeIndex({
      dataDir: workspace.dataDir,
      chunks: CHUNKS,
      matrix: MATRIX,
      model: 'test-model',
      documentCount: 2,
      ...overrides,
    });
  }

  describe('writeIndex / readIndex', () => {
    it('round-trips rows and vectors', async () => {
      await write();

      const index = await readIndex(workspace.dataDir);

      expect(index.rows).toEqual(CHUNKS);
      expect(index.matrix.rows).toBe(3);
      expect(index.matrix.dimensions).toBe(2);
      expect(Array.from(index.matrix.data)).toEqual(Array.from(MATRIX.data));
    });

    it('returns a manifest describing the build', async () => {
      const manifest = await write({ buildId: 'build-1' });

      expect(manifest).toMatchObject({
        formatVersion: 1,
        buildId: 'build-1',
        model: 'test-model',
        dimensions: 2,
        documentCount: 2,
        chunkCount: 3,
        embeddingsFile: 'builds/build-1/chunks_embeddings.f32',
        metadataFile: 'builds/build-1/chunks_meta.json',
      });
      expect(await readManifest(workspace.dataDir)).toEqual(manifest);
    });

    it('writes artifacts under the configured file names', async () => {
      await write({
        buildId: 'build-1',
        embeddingsFilename: 'vectors.bin',
        metadataFilename: 'rows.json',
      });

      const buildDir = join(workspace.dataDir, 'builds', 'build-1');
      expect(readdirSync(buildDir).sort()).toEqual(['rows.json', 'vectors.bin']);
      expect((await readIndex(workspace.dataDir)).rows).toHaveLength(3);
    });

    it('records the field limits in the metadata artifact', async () => {
      await write({ buildId: 'build-1' });

      const metadata: unknown = JSON.parse(
        readFileSync(join(workspace.dataDir, 'builds', 'build-1', 'chunks_meta.json'), 'utf-8')
      );

      expect(metadata).toMatchObject({ formatVersion: 1, maxSourceLength: 128, maxTextLength: 4000 });
    });

    it('persists and loads an empty index', async () => {
      await write({ chunks: [], matrix: { rows: 0, dimensions: 4, data: new Float32Array(0) }, documentCount: 0 });

      const index = await readIndex(workspace.dataDir);

      expect(index.rows).toEqual([]);
      expect(index.matrix.rows).toBe(0);
      expect(index.manifest.dimensions).toBe(4);
    });

    it('rejects chunks and a matrix of different lengths', async () => {
      await expect(write({ matrix: makeMatrix(2) })).rejects.toThrow(
        'Cannot write index: 3 chunk(s) but 2 embedding row(s)'
      );
      expect(existsSync(join(workspace.dataDir, 'index.json'))).toBe(false);
    });

    it('rejects an over-long field without writing anything', async () => {
      const chunks: ChunkRecord[] = [{ id: 0, source: `${'s'.repeat(129)}.txt`, text: 'ok' }];

      await expect(write({ chunks, matrix: makeMatrix(1) })).rejects.toBeInstanceOf(CorpusError);
      expect(await readManifestIfExists(workspace.dataDir)).toBeNull();
    });
  });

  describe('generations', () => {
    it('keeps the current and previous builds only', async () => {
      await write({ buildId: 'b1' });
      await write({ buildId: 'b2' });
      await write({ buildId: 'b3' });

      const builds = readdirSync(join(workspace.dataDir, 'builds')).sort();
      expect(builds).toEqual(['b2', 'b3']);
      expect((await readManifest(workspace.dataDir)).buildId).toBe('b3');
    });

    it('leaves the previous index current when a build fails', async () => {
      await write({ buildId: 'b1' });
      // A file where the new build directory should go makes mkdir fail
      writeFileSync(join(workspace.dataDir, 'builds', 'b2'), 'in the way');

      await expect(write({ buildId: 'b2', chunks: makeChunks(1), matrix: makeMatrix(1) })).rejects.toThrow();

      const index = await readIndex(workspace.dataDir);
      expect(index.manifest.buildId).toBe('b1');
      expect(index.rows).toEqual(CHUNKS);
    });

    it('replaces an unreadable manifest with a warning', async () => {
      mkdirSync(workspace.dataDir, { recursive: true });
      writeFileSync(join(workspace.dataDir, 'index.json'), '{not json');
      const logger = { info: vi.fn(), warn: vi.fn() };

      await write({ buildId: 'b1', logger });

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect((await readManifest(workspace.dataDir)).buildId).toBe('b1');
    });

    it('leaves no temporary manifest behind', async () => {
      await write({ buildId: 'b1' });

      expect(readdirSync(workspace.dataDir).sort()).toEqual(['builds', 'index.json']);
    });
  });

  describe('integrity checks', () => {
    it('raises IndexNotFoundError when nothing was built', async () => {
      const error = await readIndex(workspace.dataDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IndexNotFoundError);
      if (error instanceof IndexNotFoundError) {
        expect(error.path).toBe(join(workspace.dataDir, 'index.json'));
      }
    });

    it('raises IndexNotFoundError for a missing metadata artifact', async () => {
      await write({ buildId: 'b1' });
      const metadataPath = join(workspace.dataDir, 'builds', 'b1', 'chunks_meta.json');
      rmSync(metadataPath);

      await expect(readIndex(workspace.dataDir)).rejects.toThrow(
        `Metadata artifact not found: ${metadataPath}`
      );
    });

    it('detects embedding and metadata row counts that disagree', async () => {
      await write({ buildId: 'b1', chunks: makeChunks(5), matrix: makeMatrix(5) });
      writeFileSync(
        join(workspace.dataDir, 'builds', 'b1', 'chunks_embeddings.f32'),
        encodeEmbeddings(makeMatrix(4))
      );

      const error = await readIndex(workspace.dataDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IndexIntegrityError);
      if (error instanceof IndexIntegrityError) {
        expect(error.message).toBe('Index artifacts disagree: 4 embedding row(s) but 5 metadata row(s)');
      }
    });

    it('detects a truncated embedding artifact', async () => {
      await write({ buildId: 'b1' });
      truncateSync(join(workspace.dataDir, 'builds', 'b1', 'chunks_embeddings.f32'), 20);

      await expect(readIndex(workspace.dataDir)).rejects.toThrow(IndexIntegrityError);
    });

    it('detects a malformed manifest', async () => {
      await write();
      writeFileSync(join(workspace.dataDir, 'index.json'), JSON.stringify({ formatVersion: 1 }));

      await expect(readIndex(workspace.dataDir)).rejects.toThrow(IndexIntegrityError);
    });

    it('rejects a manifest that points outside the data directory', async () => {
      const manifest = await write({ buildId: 'b1' });
      writeFileSync(
        join(workspace.dataDir, 'index.json'),
        JSON.stringify({ ...manifest, metadataFile: '../elsewhere.json' })
      );

      await expect(readManifest(workspace.dataDir)).rejects.toThrow(IndexIntegrityError);
    });

    it('detects metadata ids out of row order', async () => {
      await write({ buildId: 'b1' });
      const metadataPath = join(workspace.dataDir, 'builds', 'b1', 'chunks_meta.json');
      writeFileSync(
        metadataPath,
        JSON.stringify({
          formatVersion: 1,
          maxSourceLength: 128,
          maxTextLength: 4000,
          rows: [CHUNKS[1], CHUNKS[0], CHUNKS[2]],
        })
      );

      await expect(readIndex(workspace.dataDir)).rejects.toThrow('expected id 0, found 1');
    });

    it('rejects an index built with a different model', async () => {
      await write();

      await expect(readIndex(workspace.dataDir, { expectedModel: 'other-model' })).rejects.toThrow(
        "Index was built with embedding model 'test-model', but 'other-model' is configured"
      );
      await expect(readIndex(workspace.dataDir, { expectedModel: 'test-model' })).resolves.toBeDefined();
    });
  });
});

describe('ChunkRecordSchema', () => {
  it('accepts ids up to the largest signed 32-bit integer', () => {
    expect(ChunkRecordSchema.safeParse({ id: 0x7fffffff, source: 'a.txt', text: 'ok' }).success).toBe(true);
  });

  it('rejects ids beyond the signed 32-bit range', () => {
    expect(ChunkRecordSchema.safeParse({ id: 0x80000000, source: 'a.txt', text: 'ok' }).success).toBe(false);
    expect(ChunkRecordSchema.safeParse({ id: -1, source: 'a.txt', text: 'ok' }).success).toBe(false);
  });
});

describe('checkFieldLimits', () => {
  const limits = { maxSourceLength: 10, maxTextLength: 20 };

  it('accepts fields at exactly the limit', () => {
    expect(() =>
      checkFieldLimits([{ id: 0, source: 'x'.repeat(10), text: 'y'.repeat(20) }], limits)
    ).not.toThrow();
  });

  it('rejects an over-long text with the chunk and file named', () => {
    expect(() =>
      checkFieldLimits([{ id: 7, source: 'notes.txt', text: 'y'.repeat(21) }], limits)
    ).toThrow('Chunk 7 of notes.txt is 21 characters, limit is 20');
  });

  it('rejects an over-long source name', () => {
    expect(() =>
      checkFieldLimits([{ id: 0, source: 'x'.repeat(11), text: 'ok' }], limits)
    ).toThrow(CorpusError);
  });
});

describe('createBuildId', () => {
  it('starts with a compact UTC timestamp', () => {
    const id = createBuildId(new Date('2026-03-04T05:06:07.890Z'));

    expect(id).toMatch(/^20260304T050607Z-[0-9a-f]{8}$/);
  });

  it('is unique for the same instant', () => {
    const now = new Date();
    expect(createBuildId(now)).not.toBe(createBuildId(now));
  });
});
