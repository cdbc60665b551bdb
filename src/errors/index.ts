/**
 * Error handling module
 *
 * Usage:
 *   import { CorpusError, handleError } from './errors/index.js';
 *
 *   throw new CorpusError('Docs directory not found: ./docs');
 */

export {
  CLIError,
  ValidationError,
  ConfigurationError,
  CorpusError,
  EmbeddingError,
  IndexNotFoundError,
  IndexIntegrityError,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  describeCause,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
