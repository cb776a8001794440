/**
 * Upload Ledger Error Handling
 *
 * FAIL FAST: every failure throws a typed error carrying a code.
 * The only absence that is not an error is FileRecord.exists().
 *
 * @module errors
 */

/**
 * Error codes for ledger operations
 */
export enum LedgerErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  LINEAGE_CYCLE = 'LINEAGE_CYCLE',
  DUPLICATE_FILE = 'DUPLICATE_FILE',
  DUPLICATE_ROW = 'DUPLICATE_ROW',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  BLOCK_NOT_FOUND = 'BLOCK_NOT_FOUND',
  TRANSIENT_STORE_FAILURE = 'TRANSIENT_STORE_FAILURE',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  TRANSACTION_STATE = 'TRANSACTION_STATE',
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  INVALID_NAME = 'INVALID_NAME',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  MIGRATION_FAILED = 'MIGRATION_FAILED',
}

/**
 * Base class for every error raised by the ledger
 */
export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LedgerError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A required precondition was not met (missing algorithm, bad LFN, ...)
 */
export class ValidationError extends LedgerError {
  constructor(message: string, code: LedgerErrorCode = LedgerErrorCode.VALIDATION_FAILED) {
    super(message, code);
    this.name = 'ValidationError';
  }
}

/**
 * A unique identity (LFN, block name) already exists
 */
export class DuplicateError extends LedgerError {
  constructor(
    message: string,
    code: LedgerErrorCode = LedgerErrorCode.DUPLICATE_ROW,
    cause?: unknown
  ) {
    super(message, code, cause);
    this.name = 'DuplicateError';
  }
}

/**
 * The referenced file or block is not present in the visible state
 */
export class NotFoundError extends LedgerError {
  constructor(message: string, code: LedgerErrorCode = LedgerErrorCode.FILE_NOT_FOUND) {
    super(message, code);
    this.name = 'NotFoundError';
  }
}

/**
 * The store failed for reasons outside the ledger's control (busy, locked, I/O).
 * Never retried here; retry policy belongs to the caller.
 */
export class TransientStoreError extends LedgerError {
  constructor(message: string, cause?: unknown) {
    super(message, LedgerErrorCode.TRANSIENT_STORE_FAILURE, cause);
    this.name = 'TransientStoreError';
  }
}

/**
 * Render an unknown caught value as a message string
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
