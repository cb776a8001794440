/**
 * Transaction scope over a better-sqlite3 connection
 *
 * Every ledger operation takes a scope explicitly. A scope with an open
 * transaction is joined; a scope without one gets a begin/commit around
 * the single operation. The ledger never opens a nested transaction.
 *
 * All statements on one connection see that connection's uncommitted
 * writes, so a scope reads its own writes until it rolls back. Scopes that
 * share a connection cannot run operations while another of them holds the
 * open transaction.
 *
 * @module storage/transaction-scope
 */

import type Database from 'better-sqlite3';
import { LedgerError, LedgerErrorCode, describeError } from '../../errors.js';

/**
 * Begin/commit/rollback plus the live connection, supplied per logical operation
 */
export interface TransactionScope {
  readonly connection: Database.Database;
  readonly inTransaction: boolean;
  begin(): void;
  commit(): void;
  rollback(): void;
}

export class SqliteTransactionScope implements TransactionScope {
  /** true while the open transaction on the connection is this scope's */
  private owns = false;

  constructor(private readonly db: Database.Database) {}

  get connection(): Database.Database {
    return this.db;
  }

  /**
   * Only the scope that began the transaction is inside it. SQLite may end a
   * transaction on its own after some failures, so the connection is checked too.
   */
  get inTransaction(): boolean {
    return this.owns && this.db.inTransaction;
  }

  begin(): void {
    if (this.db.inTransaction) {
      throw new LedgerError(
        'Cannot begin: a transaction is already open on this connection',
        LedgerErrorCode.TRANSACTION_STATE
      );
    }
    this.db.exec('BEGIN');
    this.owns = true;
  }

  commit(): void {
    this.requireOpen('commit');
    try {
      this.db.exec('COMMIT');
    } finally {
      this.owns = this.db.inTransaction;
    }
  }

  rollback(): void {
    this.requireOpen('rollback');
    try {
      this.db.exec('ROLLBACK');
    } finally {
      this.owns = this.db.inTransaction;
    }
  }

  private requireOpen(action: string): void {
    if (!this.inTransaction) {
      throw new LedgerError(
        `Cannot ${action}: no transaction is open`,
        LedgerErrorCode.TRANSACTION_STATE
      );
    }
  }
}

/**
 * Run one logical operation inside the scope's transaction.
 *
 * Joins an open transaction. Otherwise begins one, commits on success and
 * rolls back on any error before rethrowing it.
 */
export function runInTransaction<T>(scope: TransactionScope, fn: () => T): T {
  if (scope.inTransaction) {
    return fn();
  }

  scope.begin();
  let result: T;
  try {
    result = fn();
  } catch (error) {
    // SQLite rolls back by itself on some failures (SQLITE_FULL, SQLITE_IOERR)
    if (scope.inTransaction) {
      try {
        scope.rollback();
      } catch (rollbackError) {
        console.error(
          `[Transaction] Rollback failed after error "${describeError(error)}": ${describeError(rollbackError)}`
        );
      }
    }
    throw error;
  }
  scope.commit();
  return result;
}
