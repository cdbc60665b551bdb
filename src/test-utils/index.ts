/**
 * Test Utilities Module
 *
 * Shared fakes and fixtures for tests across the codebase.
 *
 * @example
 * ```typescript
 * import { HashingEmbeddingProvider, createTempWorkspace } from '../test-utils/index.js';
 *
 * const workspace = createTempWorkspace();
 * afterEach(() => workspace.cleanup());
 * ```
 */

export {
  HashingEmbeddingProvider,
  FixedEmbeddingProvider,
  createFailingProvider,
  type HashingProviderOptions,
} from './providers.js';
export { createTempWorkspace, type TempWorkspace } from './corpus.js';
