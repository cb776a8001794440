/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * checkSchemaVersion, and getCurrentSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  createIndexes,
  createTables,
  initializeLedgerMetadata,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Read the schema version stamped in the database
 * @returns 0 for a database that was never initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables and indexes
 *
 * Idempotent. Pragmas are configured by the caller when the connection
 * opens. The version is stamped last inside the transaction, so a crash
 * mid-init leaves version 0 and a clean re-init on the next open.
 *
 * @throws MigrationError if any step fails
 */
export function initializeDatabase(db: Database.Database): void {
  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeLedgerMetadata(db);
    initializeSchemaVersion(db);
  });

  try {
    initTransaction();
  } catch (error) {
    if (error instanceof MigrationError) {
      throw error;
    }
    throw new MigrationError('Database initialization failed', 'initialize', undefined, error);
  }
}

/**
 * Bring a database to SCHEMA_VERSION
 *
 * @throws MigrationError when the stored version is newer than this build
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion === SCHEMA_VERSION) {
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }

  throw new MigrationError(
    `No migration path from schema version ${String(currentVersion)} to ${String(SCHEMA_VERSION)}`,
    'version_check',
    undefined
  );
}
