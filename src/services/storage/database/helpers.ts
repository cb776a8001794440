/**
 * Helper functions for the ledger database
 *
 * Name validation, path resolution, and translation of SQLite failures
 * into the ledger's error taxonomy.
 */

import { join } from 'path';
import {
  DuplicateError,
  LedgerError,
  LedgerErrorCode,
  TransientStoreError,
  describeError,
} from '../../../errors.js';
import { loadLedgerConfig } from '../../../utils/config.js';

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * SQLite result codes that mean "try again later"
 */
const TRANSIENT_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_PROTOCOL'];

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new LedgerError('Database name is required', LedgerErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new LedgerError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      LedgerErrorCode.INVALID_NAME
    );
  }
}

export function getDefaultStoragePath(): string {
  return loadLedgerConfig().databasesPath;
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  const basePath = storagePath ?? getDefaultStoragePath();
  return join(basePath, `${name}.db`);
}

/**
 * SQLite error code of a better-sqlite3 SqliteError, if any
 */
export function sqliteErrorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Convert a failure from a store call into a ledger error.
 * Ledger errors pass through untouched; unrecognised errors are returned as-is.
 *
 * @param context - name of the operation that failed
 */
export function translateStoreError(error: unknown, context: string): unknown {
  if (error instanceof LedgerError) {
    return error;
  }

  const code = sqliteErrorCode(error);
  if (code === null) {
    return error;
  }

  if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return new DuplicateError(`${context}: ${describeError(error)}`, undefined, error);
  }
  if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
    return new LedgerError(
      `Foreign key violation in ${context}: ${describeError(error)}`,
      LedgerErrorCode.FOREIGN_KEY_VIOLATION,
      error
    );
  }
  if (TRANSIENT_CODES.some((prefix) => code.startsWith(prefix))) {
    return new TransientStoreError(`${context} failed: ${describeError(error)}`, error);
  }
  return error;
}
