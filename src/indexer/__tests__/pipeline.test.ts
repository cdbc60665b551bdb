/**
 * Index Pipeline Tests
 *
 * Builds real indexes in a temp directory with the in-process hashing
 * provider.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { buildIndex, type BuildIndexOptions } from '../pipeline.js';
import { Embedder } from '../embedder/index.js';
import type { IndexingStage } from '../types.js';
import { readIndex, readManifestIfExists } from '../../storage/index.js';
import { ConfigurationError, CorpusError, EmbeddingError } from '../../errors/index.js';
import {
  HashingEmbeddingProvider,
  createFailingProvider,
  createTempWorkspace,
  type TempWorkspace,
} from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';

const THERMOSTAT = 'The thermostat resets after 10 seconds of no input.';

describe('buildIndex', () => {
  let workspace: TempWorkspace;
  let provider: HashingEmbeddingProvider;

  beforeEach(() => {
    workspace = createTempWorkspace();
    provider = new HashingEmbeddingProvider();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  function build(overrides: Partial<BuildIndexOptions> = {}) {
    return buildIndex({
      docsDir: workspace.docsDir,
      dataDir: workspace.dataDir,
      chunkSize: 100,
      chunkOverlap: 10,
      embedder: new Embedder(provider),
      logger: silentLogger,
      ...overrides,
    });
  }

  it('indexes every document and persists aligned rows', async () => {
    workspace.writeDoc('a.txt', THERMOSTAT);
    workspace.writeDoc('b.txt', 'Hold the power button for five seconds.');

    const summary = await build();

    expect(summary).toMatchObject({
      documentCount: 2,
      chunkCount: 2,
      dimensions: 64,
      model: 'test-hashing-64',
      location: workspace.dataDir,
    });

    const index = await readIndex(workspace.dataDir);
    expect(index.manifest.buildId).toBe(summary.buildId);
    expect(index.rows).toEqual([
      { id: 0, source: 'a.txt', text: THERMOSTAT },
      { id: 1, source: 'b.txt', text: 'Hold the power button for five seconds.' },
    ]);
    expect(index.matrix.rows).toBe(2);
  });

  it('numbers chunks across documents in file-name order', async () => {
    workspace.writeDoc('b.txt', 'second file');
    workspace.writeDoc('a.txt', 'aaaa bbbb cccc dddd');

    await build({ chunkSize: 10, chunkOverlap: 0 });

    const { rows } = await readIndex(workspace.dataDir);
    expect(rows).toEqual([
      { id: 0, source: 'a.txt', text: 'aaaa bbbb' },
      { id: 1, source: 'a.txt', text: 'cccc dddd' },
      { id: 2, source: 'b.txt', text: 'second' },
      { id: 3, source: 'b.txt', text: 'file' },
    ]);
  });

  it('embeds every chunk in batches', async () => {
    workspace.writeDoc('a.txt', 'aaaa bbbb cccc dddd');

    await build({
      chunkSize: 10,
      chunkOverlap: 0,
      embedder: new Embedder(provider, { batchSize: 1 }),
    });

    expect(provider.calls).toEqual([1, 1]);
  });

  it('fires stage callbacks in pipeline order', async () => {
    workspace.writeDoc('a.txt', THERMOSTAT);
    const started: IndexingStage[] = [];
    const completed: IndexingStage[] = [];

    const summary = await build({
      onStageStart: (stage) => started.push(stage),
      onStageComplete: (stage) => completed.push(stage),
    });

    expect(started).toEqual(['scanning', 'chunking', 'embedding', 'storing']);
    expect(completed).toEqual(started);
    expect(Object.keys(summary.stageDurations)).toEqual(started);
  });

  it('reports per-file scanning progress', async () => {
    workspace.writeDoc('a.txt', 'one');
    workspace.writeDoc('b.txt', 'two');
    const onProgress = vi.fn();

    await build({ onProgress });

    expect(onProgress).toHaveBeenCalledWith('scanning', 1, 0, 'a.txt');
    expect(onProgress).toHaveBeenCalledWith('scanning', 2, 0, 'b.txt');
    expect(onProgress).toHaveBeenCalledWith('embedding', 2, 2);
  });

  it('persists an empty index for an empty corpus', async () => {
    const logger = { info: vi.fn(), warn: vi.fn() };

    const summary = await build({ logger });

    expect(summary.documentCount).toBe(0);
    expect(summary.chunkCount).toBe(0);
    expect(summary.dimensions).toBe(64);
    expect(provider.calls).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect((await readIndex(workspace.dataDir)).rows).toEqual([]);
  });

  it('counts a whitespace-only document without producing chunks', async () => {
    workspace.writeDoc('blank.txt', '  \n\n  ');
    workspace.writeDoc('real.txt', 'content');

    const summary = await build();

    expect(summary.documentCount).toBe(2);
    expect(summary.chunkCount).toBe(1);
  });

  it('only reads files with the configured extensions', async () => {
    workspace.writeDoc('a.txt', 'text file');
    workspace.writeDoc('b.md', 'markdown file');

    expect((await build()).documentCount).toBe(1);
    expect((await build({ extensions: ['txt', 'md'] })).documentCount).toBe(2);
  });

  it('replaces the previous index on rebuild', async () => {
    workspace.writeDoc('a.txt', 'first version');
    const first = await build();
    workspace.writeDoc('a.txt', 'second version');

    const second = await build();

    const index = await readIndex(workspace.dataDir);
    expect(second.buildId).not.toBe(first.buildId);
    expect(index.rows).toEqual([{ id: 0, source: 'a.txt', text: 'second version' }]);
  });

  describe('failures', () => {
    it('rejects invalid chunking parameters before reading the corpus', async () => {
      await expect(
        build({ docsDir: '/nonexistent/docs', chunkSize: 50, chunkOverlap: 50 })
      ).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('raises CorpusError for a missing docs directory', async () => {
      await expect(build({ docsDir: `${workspace.root}/missing` })).rejects.toBeInstanceOf(CorpusError);
    });

    it('rejects an over-long source name before embedding', async () => {
      workspace.writeDoc('a.txt', 'short');
      workspace.writeDoc('much-too-long.txt', 'short');

      await expect(
        build({ storage: { limits: { maxSourceLength: 10, maxTextLength: 4000 } } })
      ).rejects.toBeInstanceOf(CorpusError);
      expect(provider.calls).toEqual([]);
      expect(await readManifestIfExists(workspace.dataDir)).toBeNull();
    });

    it('keeps the previous index when embedding fails', async () => {
      workspace.writeDoc('a.txt', THERMOSTAT);
      const first = await build();
      workspace.writeDoc('b.txt', 'new document');

      await expect(
        build({ embedder: new Embedder(createFailingProvider()) })
      ).rejects.toBeInstanceOf(EmbeddingError);

      const index = await readIndex(workspace.dataDir);
      expect(index.manifest.buildId).toBe(first.buildId);
      expect(index.rows).toHaveLength(1);
    });
  });
});
