/**
 * Error type definitions for ragdex
 *
 * Every failure the retrieval core can raise is one of these classes.
 * Each carries:
 * - A recovery hint shown to the user
 * - An exit code so scripts can tell failures apart
 */

/**
 * Base class for all ragdex errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, options?: ErrorOptions) {
    super(message, options);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when user input is rejected (bad `k`, empty query, bad flag value).
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown for invalid configuration.
 *
 * Examples:
 * - chunk_overlap >= chunk_size
 * - Invalid TOML syntax in ragdex.toml
 * - An environment override that is not an integer
 *
 * Exit code 2: Configuration error
 */
export class ConfigurationError extends CLIError {
  /** Individual configuration issues, one per offending key */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], hint?: string) {
    const detail = issues.length > 0 ? `\n  ${issues.join('\n  ')}` : '';
    super(
      message + detail,
      hint ?? 'Run: ragdex config list  to see the effective configuration',
      2
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the document corpus cannot be ingested.
 *
 * Covers a missing or unreadable corpus directory and chunk fields
 * that exceed the persisted length limits.
 *
 * Exit code 3: Corpus error
 */
export class CorpusError extends CLIError {
  constructor(message: string, hint?: string, options?: ErrorOptions) {
    super(message, hint ?? 'Check the docs directory: ragdex config get paths.docs_dir', 3, options);
    this.name = 'CorpusError';
  }
}

/**
 * Thrown when the embedding backend fails or returns unusable vectors.
 *
 * The original backend error is kept as `cause`.
 *
 * Exit code 4: Embedding error
 */
export class EmbeddingError extends CLIError {
  constructor(message: string, cause?: unknown, hint?: string) {
    super(
      message,
      hint ?? 'Check the embedding provider settings: ragdex config get embedding',
      4,
      cause === undefined ? undefined : { cause }
    );
    this.name = 'EmbeddingError';
  }
}

/**
 * Thrown when no persisted index exists at the configured location.
 *
 * Exit code 5: Index not found
 */
export class IndexNotFoundError extends CLIError {
  /** Path that was expected to exist */
  public readonly path: string;

  constructor(path: string, what: string = 'Index manifest') {
    super(`${what} not found: ${path}`, 'Build the index first: ragdex ingest', 5);
    this.name = 'IndexNotFoundError';
    this.path = path;
  }
}

/**
 * Thrown when a persisted index is present but unusable.
 *
 * Examples:
 * - Embedding rows and metadata rows disagree
 * - Truncated or malformed artifact
 * - Index built with a different embedding model than configured
 *
 * Exit code 6: Index integrity error
 */
export class IndexIntegrityError extends CLIError {
  constructor(message: string, hint?: string, options?: ErrorOptions) {
    super(message, hint ?? 'Rebuild the index: ragdex ingest', 6, options);
    this.name = 'IndexIntegrityError';
  }
}
