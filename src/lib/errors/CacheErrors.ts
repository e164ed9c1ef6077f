/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Nothing found upstream; propagated as empty or zero
   */
  ABSENCE = 'absence',

  /**
   * Network or service errors that may resolve on retry
   */
  TRANSIENT = 'transient',

  /**
   * A local cache file exists but cannot be read
   */
  CORRUPTION = 'corruption',

  /**
   * The request is invalid against the data currently available
   */
  REJECTED = 'rejected',

  /**
   * The local cache directory cannot be written
   */
  STORAGE = 'storage'
}

/**
 * Base error class for partition cache errors
 */
export abstract class CacheError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;

  constructor(message: string, code: string, category: ErrorCategory, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Hub request failure (listing or download)
 */
export class RemoteCatalogError extends CacheError {
  public readonly remotePath: string;
  public readonly status?: number;

  constructor(remotePath: string, message: string, status?: number) {
    super(`Hub request failed for ${remotePath}: ${message}`, 'REMOTE_CATALOG_ERROR', ErrorCategory.TRANSIENT, true);
    this.remotePath = remotePath;
    this.status = status;
  }

  /**
   * 404 means the partition simply is not there
   */
  isNotFound(): boolean {
    return this.status === 404;
  }
}

/**
 * Unreadable or invalid record file
 */
export class CacheCorruptionError extends CacheError {
  public readonly path: string;
  public readonly originalError?: Error;

  constructor(path: string, reason: string, originalError?: Error) {
    super(`Unreadable cache file ${path}: ${reason}`, 'CACHE_CORRUPTION', ErrorCategory.CORRUPTION);
    this.path = path;
    this.originalError = originalError;
  }
}

/**
 * A cache file could not be written; the previous content is left as it was
 */
export class CacheWriteError extends CacheError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot write cache file ${path}: ${reason}`, 'CACHE_WRITE_ERROR', ErrorCategory.STORAGE);
    this.path = path;
  }
}

/**
 * Embedding collaborator failure
 */
export class EmbeddingError extends CacheError {
  public readonly partition: string;

  constructor(partition: string, message: string) {
    super(`Embedding failed for ${partition}: ${message}`, 'EMBEDDING_ERROR', ErrorCategory.TRANSIENT, true);
    this.partition = partition;
  }
}

/**
 * Projection collaborator failure
 */
export class ProjectionError extends CacheError {
  public readonly fingerprint: string;

  constructor(fingerprint: string, message: string) {
    super(`Projection failed for ${fingerprint}: ${message}`, 'PROJECTION_ERROR', ErrorCategory.TRANSIENT);
    this.fingerprint = fingerprint;
  }
}

/**
 * Topic extraction failure
 */
export class TopicError extends CacheError {
  public readonly cacheKey: string;

  constructor(cacheKey: string, message: string) {
    super(`Topic extraction failed for ${cacheKey}: ${message}`, 'TOPIC_ERROR', ErrorCategory.TRANSIENT);
    this.cacheKey = cacheKey;
  }
}

/**
 * The request cannot be served with the data available now
 */
export class SelectionRejectedError extends CacheError {
  public readonly available: number;
  public readonly required: number;

  constructor(message: string, available: number, required: number) {
    super(message, 'SELECTION_REJECTED', ErrorCategory.REJECTED);
    this.available = available;
    this.required = required;
  }
}

/**
 * Invalid partition key or selection shape
 */
export class InvalidRequestError extends CacheError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`, 'INVALID_REQUEST', ErrorCategory.REJECTED);
    this.field = field;
  }
}
