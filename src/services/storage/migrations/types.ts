/**
 * Type definitions and error classes for database migrations
 *
 * @module migrations/types
 */

import { LedgerError, LedgerErrorCode } from '../../../errors.js';

/**
 * Error class for database migration failures
 */
export class MigrationError extends LedgerError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly tableName?: string,
    cause?: unknown
  ) {
    super(message, LedgerErrorCode.MIGRATION_FAILED, cause);
    this.name = 'MigrationError';
  }
}
