/**
 * S3 Folder Sync - Error Taxonomy
 *
 * Every error the engine reasons about carries a stable `code`. Arbitrary
 * errors (S3 SDK, Node errno) are mapped onto these by categorizeError().
 */

// ============================================================================
// Error Classes
// ============================================================================

export const ErrorCode = {
  CORRUPT_MANIFEST: 'corrupt_manifest',
  TRANSIENT_STORE: 'transient_store',
  PERSISTENT_STORE: 'persistent_store',
  CHECKSUM_MISMATCH: 'checksum_mismatch',
  ROOT_UNAVAILABLE: 'root_unavailable',
  LOCAL_NOT_FOUND: 'local_not_found',
  NO_WATCHED_ROOTS: 'no_watched_roots',
  CONFIG: 'config',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export abstract class SyncError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The persisted manifest cannot be parsed. Recovered by a full re-scan. */
export class CorruptManifestError extends SyncError {
  readonly code = ErrorCode.CORRUPT_MANIFEST;
}

/** Network or store failure during a transfer; retried with backoff. */
export class TransientStoreError extends SyncError {
  readonly code = ErrorCode.TRANSIENT_STORE;
}

/** Non-retryable store response (permission denied, missing bucket, ...). */
export class PersistentStoreError extends SyncError {
  readonly code = ErrorCode.PERSISTENT_STORE;
}

/** The store confirmed a checksum other than the one computed locally. */
export class ChecksumMismatchError extends SyncError {
  readonly code = ErrorCode.CHECKSUM_MISMATCH;

  constructor(
    readonly expected: string,
    readonly confirmed: string
  ) {
    super(`Checksum mismatch: expected ${expected}, store confirmed ${confirmed}`);
  }
}

/** A watched root vanished or became unreadable. */
export class WatchedRootUnavailableError extends SyncError {
  readonly code = ErrorCode.ROOT_UNAVAILABLE;

  constructor(
    readonly root: string,
    options?: { cause?: unknown }
  ) {
    super(`Watched root unavailable: ${root}`, options);
  }
}

/** None of the configured roots resolve to a real directory. Fatal at startup. */
export class NoWatchedRootsError extends SyncError {
  readonly code = ErrorCode.NO_WATCHED_ROOTS;
}

/** Invalid configuration. Fatal at startup. */
export class ConfigError extends SyncError {
  readonly code = ErrorCode.CONFIG;
}

// ============================================================================
// Error Categorization
// ============================================================================

export const ErrorCategory = {
  TRANSIENT: 'transient',
  PERSISTENT: 'persistent',
  CHECKSUM_MISMATCH: 'checksum_mismatch',
  LOCAL_NOT_FOUND: 'local_not_found',
} as const;
export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Extract error message from unknown error */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Read the errno-style `code` of an unknown error, if it has one */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Map any error raised while uploading a file onto a retry category.
 * Unknown errors are treated as transient: the retry ceiling bounds them.
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof ChecksumMismatchError) return ErrorCategory.CHECKSUM_MISMATCH;
  if (error instanceof PersistentStoreError) return ErrorCategory.PERSISTENT;
  if (error instanceof TransientStoreError) return ErrorCategory.TRANSIENT;
  if (isNotFoundError(error)) return ErrorCategory.LOCAL_NOT_FOUND;

  const code = getErrorCode(error);
  if (code === 'EACCES' || code === 'EPERM' || code === 'EISDIR') {
    return ErrorCategory.PERSISTENT;
  }
  return ErrorCategory.TRANSIENT;
}
