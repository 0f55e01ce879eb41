import type { AdapterError } from '../../services/embedding/adapter-interface.js';

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Caller may retry, or continue without retrieval context
   */
  RECOVERABLE = 'recoverable',

  /**
   * Handled internally by forcing a rebuild
   */
  REBUILD = 'rebuild',

  /**
   * Aborts the current build; nothing is persisted
   */
  FATAL = 'fatal'
}

/**
 * Base class for retrieval engine errors
 */
export abstract class EngineError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    retryable: boolean = false,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Embeddings in one build disagree on width, or a stored snapshot
 * disagrees with the live model
 */
export class DimensionMismatchError extends EngineError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, detail?: string) {
    super(
      `Dimension mismatch: expected ${expected}, got ${actual}${detail ? ` (${detail})` : ''}`,
      'DIMENSION_MISMATCH',
      ErrorCategory.FATAL
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Collection has never been built
 */
export class SnapshotNotFoundError extends EngineError {
  public readonly collection: string;

  constructor(collection: string) {
    super(`No snapshot recorded for collection '${collection}'`, 'SNAPSHOT_NOT_FOUND', ErrorCategory.REBUILD);
    this.collection = collection;
  }
}

/**
 * Persisted metadata or snapshot could not be read
 */
export class SnapshotCorruptError extends EngineError {
  public readonly collection: string;

  constructor(collection: string, detail: string, cause?: Error) {
    super(`Snapshot for collection '${collection}' is corrupt: ${detail}`, 'SNAPSHOT_CORRUPT', ErrorCategory.REBUILD, false, cause);
    this.collection = collection;
  }
}

/**
 * Embedding provider call failed
 */
export class ProviderFailureError extends EngineError {
  public readonly adapterCode: string;

  constructor(adapterError: AdapterError) {
    super(
      `Embedding provider failed: ${adapterError.message}`,
      'PROVIDER_FAILURE',
      ErrorCategory.RECOVERABLE,
      adapterError.retryable,
      adapterError
    );
    this.adapterCode = adapterError.code;
  }
}

/**
 * Writing, renaming or deleting persisted files failed
 */
export class PersistenceFailureError extends EngineError {
  public readonly path: string;
  public readonly operation: string;

  constructor(operation: string, path: string, cause?: Error) {
    super(
      `Failed to ${operation} ${path}${cause ? ` - ${cause.message}` : ''}`,
      'PERSISTENCE_FAILURE',
      ErrorCategory.RECOVERABLE,
      true,
      cause
    );
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Retrieval was requested for a collection nobody registered
 */
export class UnknownCollectionError extends EngineError {
  public readonly collection: string;

  constructor(collection: string) {
    super(`Unknown collection '${collection}'`, 'UNKNOWN_COLLECTION', ErrorCategory.FATAL);
    this.collection = collection;
  }
}

/**
 * Corpus supplier could not produce entries
 */
export class CorpusLoadError extends EngineError {
  public readonly source: string;

  constructor(source: string, detail: string, cause?: Error) {
    super(`Failed to load corpus from ${source}: ${detail}`, 'CORPUS_LOAD_FAILED', ErrorCategory.RECOVERABLE, false, cause);
    this.source = source;
  }
}

/**
 * Check if an error should cause the cache manager to rebuild instead of failing
 */
export function requiresRebuild(error: unknown): error is SnapshotNotFoundError | SnapshotCorruptError {
  return error instanceof EngineError && error.category === ErrorCategory.REBUILD;
}
