/**
 * Exact similarity scan
 *
 * Scores every row of the matrix against the query. This is O(N·D) per
 * query with no approximate structure; corpora are expected to be small.
 */

import type { EmbeddingMatrix } from '../indexer/embedder/types.js';

export interface ScoredRow {
  /** Row position in the matrix */
  row: number;
  score: number;
}

/**
 * Dot product of `query` with every row of `matrix`, accumulated in float64.
 */
export function scoreRows(query: Float32Array, matrix: EmbeddingMatrix): Float64Array {
  const { rows, dimensions, data } = matrix;
  const scores = new Float64Array(rows);

  for (let r = 0; r < rows; r++) {
    const offset = r * dimensions;
    let sum = 0;
    for (let d = 0; d < dimensions; d++) {
      sum += (query[d] ?? 0) * (data[offset + d] ?? 0);
    }
    scores[r] = sum;
  }

  return scores;
}

/**
 * Compare by descending score, then ascending id.
 */
export function compareScored(a: ScoredRow & { id: number }, b: ScoredRow & { id: number }): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return a.id - b.id;
}

/**
 * Select the `k` best rows by descending score. Equal scores are ordered
 * by ascending id so the result is deterministic.
 *
 * @param ids - Chunk id of each row
 */
export function selectTopK(scores: Float64Array, ids: ArrayLike<number>, k: number): ScoredRow[] {
  const limit = Math.min(k, scores.length);
  if (limit <= 0) {
    return [];
  }

  const candidates: Array<ScoredRow & { id: number }> = [];
  for (let row = 0; row < scores.length; row++) {
    candidates.push({ row, id: ids[row] ?? row, score: scores[row] ?? 0 });
  }
  candidates.sort(compareScored);

  return candidates.slice(0, limit).map(({ row, score }) => ({ row, score }));
}
