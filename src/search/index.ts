/**
 * Search Module
 *
 * Exact dense retrieval over the persisted index, plus result formatting.
 *
 * @example
 * ```typescript
 * import { createVectorIndex, formatContext } from './search/index.js';
 *
 * const index = createVectorIndex(config, provider);
 * const results = await index.retrieve('How do I pair the remote?', config.search.top_k);
 * console.log(formatContext(results));
 * ```
 */

export { VectorIndex, createVectorIndex } from './vector-index.js';
export { scoreRows, selectTopK, compareScored, type ScoredRow } from './similarity.js';
export {
  formatContext,
  formatScore,
  truncateSnippet,
  formatResult,
  formatResults,
  formatResultsJSON,
} from './formatter.js';
export type {
  QueryResult,
  IndexState,
  VectorIndexOptions,
  FormatOptions,
  FormattedResultJSON,
} from './types.js';
