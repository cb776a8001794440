/**
 * Database Schema Migrations for the Upload Ledger
 *
 * SQLite schema initialization and migrations over better-sqlite3.
 * WAL mode, foreign keys, parameterized statements throughout.
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
} from './operations.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema } from './verification.js';
