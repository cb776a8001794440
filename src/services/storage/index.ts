/**
 * Storage Service Module
 *
 * Database lifecycle, schema migrations, transaction scopes and the
 * query catalog for the upload ledger.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  configurePragmas,
  MigrationError,
} from './migrations/index.js';

export {
  LedgerDatabase,
  translateStoreError,
  type LedgerDatabaseInfo,
  type LedgerStats,
} from './database/index.js';

export {
  SqliteTransactionScope,
  runInTransaction,
  type TransactionScope,
} from './transaction-scope.js';

export {
  QueryCatalog,
  getQueryCatalog,
  type LedgerQueries,
  type QueryArgs,
  type QueryName,
  type QueryResult,
  type QuerySignatures,
} from './query-catalog.js';
