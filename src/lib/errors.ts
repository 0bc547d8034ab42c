/**
 * Typed errors raised by the blob store
 *
 * Hierarchy:
 * - BlobStoreError (base, carries a stable `code`)
 *   - InvalidDigestFormatError (malformed digest string, raised before any path is touched)
 *   - InvalidStoreRootError (unusable store root path)
 *   - BlobStoreIoError (a filesystem step failed)
 *   - BlobIntegrityError (content does not hash to the expected digest)
 *   - NotImplementedError (operation deliberately unsupported)
 *
 * A dedup hit or a lost publish race is a normal result, never one of these.
 */

export type BlobStoreErrorCode =
  | 'INVALID_DIGEST_FORMAT'
  | 'INVALID_STORE_ROOT'
  | 'IO_ERROR'
  | 'INTEGRITY_MISMATCH'
  | 'NOT_IMPLEMENTED';

/** Base error class for all blob store errors */
export class BlobStoreError extends Error {
  readonly code: BlobStoreErrorCode;

  constructor(message: string, code: BlobStoreErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BlobStoreError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class InvalidDigestFormatError extends BlobStoreError {
  readonly digest: string;

  constructor(digest: string) {
    super(`Invalid digest "${digest}": expected 64 lowercase hex characters`, 'INVALID_DIGEST_FORMAT');
    this.name = 'InvalidDigestFormatError';
    this.digest = digest;
  }
}

export class InvalidStoreRootError extends BlobStoreError {
  readonly root: string;

  constructor(root: string, reason: string) {
    super(`Invalid store root "${root}": ${reason}`, 'INVALID_STORE_ROOT');
    this.name = 'InvalidStoreRootError';
    this.root = root;
  }
}

/**
 * Filesystem operations the store performs, used to label I/O failures
 */
export type BlobStoreOperation =
  | 'read'
  | 'stat'
  | 'mkdir'
  | 'create-staging'
  | 'copy'
  | 'fsync'
  | 'chmod'
  | 'link'
  | 'rename'
  | 'unlink';

export class BlobStoreIoError extends BlobStoreError {
  readonly operation: BlobStoreOperation;
  readonly path: string;
  /** errno code of the underlying failure (ENOENT, EACCES, ...) */
  readonly syscallCode?: string;

  constructor(operation: BlobStoreOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Blob store ${operation} failed for ${path}: ${reason}`, 'IO_ERROR', { cause });
    this.name = 'BlobStoreIoError';
    this.operation = operation;
    this.path = path;
    this.syscallCode = errnoCode(cause);
  }
}

export class BlobIntegrityError extends BlobStoreError {
  readonly expected: string;
  readonly actual: string;
  readonly path: string;

  constructor(expected: string, actual: string, path: string) {
    super(`Hash mismatch for ${path}: expected ${expected}, got ${actual}`, 'INTEGRITY_MISMATCH');
    this.name = 'BlobIntegrityError';
    this.expected = expected;
    this.actual = actual;
    this.path = path;
  }
}

export class NotImplementedError extends BlobStoreError {
  readonly operation: string;

  constructor(operation: string) {
    super(`${operation} is not implemented`, 'NOT_IMPLEMENTED');
    this.name = 'NotImplementedError';
    this.operation = operation;
  }
}

/**
 * Extract the errno code (e.g. "EEXIST") from an unknown thrown value
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
