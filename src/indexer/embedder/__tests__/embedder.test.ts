/**
 * Embedder Tests
 *
 * Uses in-process providers to avoid model downloads in CI.
 */

import { describe, it, expect, vi } from 'vitest';

import { Embedder, matrixRow } from '../embedder.js';
import type { EmbeddingProvider } from '../types.js';
import { EmbeddingError } from '../../../errors/index.js';
import {
  HashingEmbeddingProvider,
  FixedEmbeddingProvider,
  createFailingProvider,
} from '../../../test-utils/index.js';

function norm(vector: Float32Array): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

function providerReturning(vectors: ArrayLike<number>[], dimensions?: number): EmbeddingProvider {
  return {
    name: 'stub',
    model: 'stub-model',
    dimensions,
    embedBatch: async () => vectors,
  };
}

describe('Embedder', () => {
  it('returns a rows x dimensions matrix of unit vectors', async () => {
    const embedder = new Embedder(new HashingEmbeddingProvider({ dimensions: 16 }));

    const matrix = await embedder.embed(['reset the thermostat', 'battery level low', 'wifi setup']);

    expect(matrix.rows).toBe(3);
    expect(matrix.dimensions).toBe(16);
    expect(matrix.data).toHaveLength(48);
    for (let i = 0; i < matrix.rows; i++) {
      expect(Math.abs(norm(matrixRow(matrix, i)) - 1)).toBeLessThan(1e-4);
    }
  });

  it('re-normalizes provider output of any scale', async () => {
    const embedder = new Embedder(providerReturning([[3, 4]], 2));

    const matrix = await embedder.embed(['x']);

    expect(matrix.data[0]).toBeCloseTo(0.6, 6);
    expect(matrix.data[1]).toBeCloseTo(0.8, 6);
  });

  it('is deterministic for identical input', async () => {
    const embedder = new Embedder(new HashingEmbeddingProvider());

    const a = await embedder.embedQuery('How do I reset the thermostat?');
    const b = await embedder.embedQuery('How do I reset the thermostat?');

    expect(dot(a, b)).toBeGreaterThanOrEqual(0.999999);
  });

  it('gives the same vectors batched or one at a time', async () => {
    const texts = ['alpha beta', 'gamma delta', 'epsilon', 'zeta eta theta', 'iota'];
    const batched = await new Embedder(new HashingEmbeddingProvider(), { batchSize: 2 }).embed(texts);
    const single = new Embedder(new HashingEmbeddingProvider(), { batchSize: 1 });

    for (let i = 0; i < texts.length; i++) {
      const text = texts[i] ?? '';
      expect(Array.from(await single.embedQuery(text))).toEqual(
        Array.from(matrixRow(batched, i))
      );
    }
  });

  it('calls the provider in batches of batchSize and reports progress', async () => {
    const provider = new HashingEmbeddingProvider();
    const embedder = new Embedder(provider, { batchSize: 2 });
    const onProgress = vi.fn();

    await embedder.embed(['a', 'b', 'c', 'd', 'e'], { onProgress });

    expect(provider.calls).toEqual([2, 2, 1]);
    expect(onProgress.mock.calls).toEqual([
      [2, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it('returns an empty matrix without calling the provider', async () => {
    const provider = new HashingEmbeddingProvider({ dimensions: 8 });
    const matrix = await new Embedder(provider).embed([]);

    expect(matrix).toEqual({ rows: 0, dimensions: 8, data: new Float32Array(0) });
    expect(provider.calls).toEqual([]);
  });

  it('reports zero dimensions for an empty matrix when the size is unknown', async () => {
    const provider = new HashingEmbeddingProvider({ declareDimensions: false });

    expect((await new Embedder(provider).embed([])).dimensions).toBe(0);
  });

  it('learns dimensions from the first result when the provider declares none', async () => {
    const embedder = new Embedder(new HashingEmbeddingProvider({ dimensions: 12, declareDimensions: false }));
    expect(embedder.dimensions).toBeUndefined();

    await embedder.embed(['hello']);

    expect(embedder.dimensions).toBe(12);
    expect(embedder.model).toBe('test-hashing-64');
  });

  it('exposes scores that rank shared words higher', async () => {
    const embedder = new Embedder(new HashingEmbeddingProvider({ dimensions: 256 }));
    const query = await embedder.embedQuery('thermostat reset');
    const matrix = await embedder.embed(['the thermostat reset procedure', 'pairing a bluetooth speaker']);

    expect(dot(query, matrixRow(matrix, 0))).toBeGreaterThan(dot(query, matrixRow(matrix, 1)));
  });

  describe('failures', () => {
    it('wraps provider errors in EmbeddingError with the cause', async () => {
      const cause = new Error('connect ECONNREFUSED');
      const embedder = new Embedder(createFailingProvider(cause));

      const error = await embedder.embed(['x']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      if (error instanceof EmbeddingError) {
        expect(error.message).toBe("Embedding provider 'failing' failed: connect ECONNREFUSED");
        expect(error.cause).toBe(cause);
      }
    });

    it('passes EmbeddingError from the provider through unchanged', async () => {
      const original = new EmbeddingError('model missing');
      const embedder = new Embedder(createFailingProvider(original));

      await expect(embedder.embed(['x'])).rejects.toBe(original);
    });

    it('rejects a wrong number of vectors', async () => {
      const embedder = new Embedder(providerReturning([[1, 0]], 2));

      await expect(embedder.embed(['a', 'b'])).rejects.toThrow(
        "Embedding provider 'stub' returned 1 vector(s) for 2 input(s)"
      );
    });

    it('rejects a vector whose length differs from the declared dimensions', async () => {
      const embedder = new Embedder(providerReturning([[1, 0, 0]], 2));

      await expect(embedder.embed(['a'])).rejects.toThrow('Embedding 0 has 3 dimensions, expected 2');
    });

    it('rejects inconsistent dimensions within a batch', async () => {
      const embedder = new Embedder(providerReturning([[1, 0], [1, 0, 0]]));

      await expect(embedder.embed(['a', 'b'])).rejects.toThrow(
        'Embedding 1 has 3 dimensions, expected 2'
      );
    });

    it('rejects zero vectors', async () => {
      const embedder = new Embedder(providerReturning([[0, 0]], 2));

      await expect(embedder.embed(['a'])).rejects.toThrow('Embedding 0 is a zero vector');
    });

    it('rejects non-finite values', async () => {
      const embedder = new Embedder(providerReturning([[1, Number.NaN]], 2));

      await expect(embedder.embed(['a'])).rejects.toThrow(EmbeddingError);
    });

    it('surfaces unknown fixed-vector text as EmbeddingError', async () => {
      const embedder = new Embedder(new FixedEmbeddingProvider({ known: [1, 0] }));

      await expect(embedder.embed(['unknown'])).rejects.toThrow(EmbeddingError);
    });

    it('rejects an invalid batch size', () => {
      expect(() => new Embedder(new HashingEmbeddingProvider(), { batchSize: 0 })).toThrow(
        EmbeddingError
      );
    });
  });
});
