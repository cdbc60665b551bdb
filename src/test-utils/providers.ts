/**
 * In-process embedding providers for tests.
 *
 * Nothing here downloads a model or opens a socket.
 */

import type { EmbeddingProvider } from '../indexer/embedder/types.js';

/**
 * 32-bit FNV-1a hash of a string.
 */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export interface HashingProviderOptions {
  dimensions?: number;
  model?: string;
  /** Declare `dimensions` up front (default true) */
  declareDimensions?: boolean;
}

/**
 * Bag-of-words provider: every lower-cased word adds ±1 to one hashed
 * component, so texts that share words score higher against each other.
 * Deterministic across runs.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly model: string;
  readonly dimensions?: number;
  /** Number of embedBatch calls, and the size of each */
  readonly calls: number[] = [];

  private readonly size: number;

  constructor(options: HashingProviderOptions = {}) {
    this.size = options.dimensions ?? 64;
    this.model = options.model ?? 'test-hashing-64';
    this.dimensions = options.declareDimensions === false ? undefined : this.size;
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.size).fill(0);
    const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [text];
    for (const word of words) {
      const hash = fnv1a(word);
      const index = hash % this.size;
      vector[index] = (vector[index] ?? 0) + ((hash >>> 16) & 1 ? 1 : -1);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push(texts.length);
    return texts.map((text) => this.vectorFor(text));
  }
}

/**
 * Provider that returns fixed vectors by exact text, and fails for any
 * text it was not given.
 */
export class FixedEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fixed';
  readonly model: string;
  readonly dimensions?: number;

  private readonly vectors: Map<string, number[]>;

  constructor(vectors: Record<string, number[]>, model = 'test-fixed') {
    this.vectors = new Map(Object.entries(vectors));
    this.model = model;
    const first = this.vectors.values().next();
    this.dimensions = first.done ? undefined : first.value.length;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => {
      const vector = this.vectors.get(text);
      if (vector === undefined) {
        throw new Error(`No fixed vector for: ${text}`);
      }
      return vector;
    });
  }
}

/**
 * Provider whose embedBatch rejects with `error`.
 */
export function createFailingProvider(
  error: unknown = new Error('backend unavailable'),
  model = 'test-failing'
): EmbeddingProvider {
  return {
    name: 'failing',
    model,
    dimensions: 4,
    embedBatch: () => Promise.reject(error),
  };
}
