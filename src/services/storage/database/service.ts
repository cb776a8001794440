/**
 * LedgerDatabase - one open ledger store
 *
 * Owns the better-sqlite3 connection and the query catalog selected for it,
 * and hands out transaction scopes over that connection.
 */

import type Database from 'better-sqlite3';
import { loadLedgerConfig, type LedgerConfig } from '../../../utils/config.js';
import { getQueryCatalog, type QueryCatalog } from '../query-catalog.js';
import { SqliteTransactionScope, type TransactionScope } from '../transaction-scope.js';
import type { LedgerDatabaseInfo, LedgerStats } from './types.js';
import {
  createDatabase,
  openDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
  type OpenedDatabase,
} from './static-operations.js';
import { getStats, updateMetadataModified } from './stats-operations.js';
import { describeError } from '../../../errors.js';

export class LedgerDatabase {
  private readonly db: Database.Database;
  private readonly name: string;
  private readonly path: string;
  readonly catalog: QueryCatalog;
  readonly config: LedgerConfig;

  private constructor(opened: OpenedDatabase, config: LedgerConfig) {
    this.db = opened.db;
    this.name = opened.name;
    this.path = opened.path;
    this.config = config;
    this.catalog = getQueryCatalog(config.dialect);
  }

  private static resolveConfig(storagePath?: string): LedgerConfig {
    return loadLedgerConfig(storagePath === undefined ? undefined : { databasesPath: storagePath });
  }

  static create(name: string, storagePath?: string): LedgerDatabase {
    const config = LedgerDatabase.resolveConfig(storagePath);
    return new LedgerDatabase(
      createDatabase(name, config.databasesPath, config.busyTimeoutMs),
      config
    );
  }

  static open(name: string, storagePath?: string): LedgerDatabase {
    const config = LedgerDatabase.resolveConfig(storagePath);
    return new LedgerDatabase(
      openDatabase(name, config.databasesPath, config.busyTimeoutMs),
      config
    );
  }

  static list(storagePath?: string): LedgerDatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  /**
   * New scope over this database's connection. Scopes share the connection,
   * so at most one of them can hold an open transaction at a time.
   */
  createScope(): TransactionScope {
    return new SqliteTransactionScope(this.db);
  }

  getStats(): LedgerStats {
    return getStats(this.db, this.name, this.path);
  }

  /** Bump ledger_metadata.last_modified_at */
  touch(): void {
    updateMetadataModified(this.db);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error('[LedgerDatabase] pragma optimize failed:', describeError(error));
    }
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  getConnection(): Database.Database {
    return this.db;
  }
}
