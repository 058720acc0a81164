/**
 * Memory Error Types
 *
 * Every failure surfaced by the tiered store and its pipeline carries a
 * stable `code` and a `recoverable` flag. Oracle failures are recoverable
 * by definition: callers fall back instead of failing the cycle.
 */

export interface MemoryErrorOptions {
  code: string;
  recoverable: boolean;
  cause?: unknown;
}

export class MemoryError extends Error {
  readonly code: string;
  readonly recoverable: boolean;

  constructor(message: string, options: MemoryErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'MemoryError';
    this.code = options.code;
    this.recoverable = options.recoverable;
  }
}

/** The storage medium rejected a read or write. */
export class StorageError extends MemoryError {
  readonly path: string;

  constructor(operation: string, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Storage ${operation} failed for ${path}${detail}`, {
      code: 'STORAGE_ERROR',
      recoverable: false,
      cause,
    });
    this.name = 'StorageError';
    this.path = path;
  }
}

/** A write targeted a bucket that has already been promoted. */
export class StaleBucketError extends MemoryError {
  readonly bucketId: string;

  constructor(bucketId: string, detail = 'has already been promoted') {
    super(`Bucket ${bucketId} ${detail}`, { code: 'STALE_BUCKET', recoverable: false });
    this.name = 'StaleBucketError';
    this.bucketId = bucketId;
  }
}

export class OracleTimeoutError extends MemoryError {
  readonly oracle: string;
  readonly timeoutMs: number;

  constructor(oracle: string, timeoutMs: number, cause?: unknown) {
    super(`${oracle} oracle timed out after ${timeoutMs}ms`, {
      code: 'ORACLE_TIMEOUT',
      recoverable: true,
      cause,
    });
    this.name = 'OracleTimeoutError';
    this.oracle = oracle;
    this.timeoutMs = timeoutMs;
  }
}

export class OracleMalformedResponseError extends MemoryError {
  readonly oracle: string;

  constructor(oracle: string, detail: string, cause?: unknown) {
    super(`${oracle} oracle returned a malformed response: ${detail}`, {
      code: 'ORACLE_MALFORMED',
      recoverable: true,
      cause,
    });
    this.name = 'OracleMalformedResponseError';
    this.oracle = oracle;
  }
}

/** A write would drop or alter a protected entry. */
export class ProtectionViolationError extends MemoryError {
  readonly entryIds: string[];

  constructor(entryIds: string[], detail: string) {
    super(`Protected entries ${entryIds.join(', ')} ${detail}`, {
      code: 'PROTECTION_VIOLATION',
      recoverable: false,
    });
    this.name = 'ProtectionViolationError';
    this.entryIds = entryIds;
  }
}

export class MemoryNotFoundError extends MemoryError {
  constructor(what: string) {
    super(`${what} not found`, { code: 'NOT_FOUND', recoverable: false });
    this.name = 'MemoryNotFoundError';
  }
}

export class MemoryValidationError extends MemoryError {
  constructor(message: string) {
    super(message, { code: 'VALIDATION_ERROR', recoverable: false });
    this.name = 'MemoryValidationError';
  }
}
