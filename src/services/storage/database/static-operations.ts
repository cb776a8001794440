/**
 * Static operations for LedgerDatabase - database lifecycle: create, open, list, delete, exists.
 */

import Database from 'better-sqlite3';
import {
  statSync,
  existsSync,
  mkdirSync,
  readdirSync,
  unlinkSync,
  writeFileSync,
  chmodSync,
} from 'fs';
import { join } from 'path';
import {
  initializeDatabase,
  migrateToLatest,
  verifySchema,
  configurePragmas,
} from '../migrations/index.js';
import { LedgerError, LedgerErrorCode, describeError } from '../../../errors.js';
import type { LedgerDatabaseInfo, MetadataRow } from './types.js';
import { getDefaultStoragePath, validateName, getDatabasePath } from './helpers.js';

export interface OpenedDatabase {
  db: Database.Database;
  name: string;
  path: string;
}

function removeDatabaseFile(dbPath: string, reason: string): void {
  try {
    unlinkSync(dbPath);
  } catch (cleanupErr) {
    console.error(
      `[static-operations] Failed to clean up db file after ${reason}:`,
      describeError(cleanupErr)
    );
  }
}

/**
 * Create a new ledger database
 * @throws LedgerError if name is invalid or database already exists
 */
export function createDatabase(
  name: string,
  storagePath?: string,
  busyTimeoutMs?: number
): OpenedDatabase {
  validateName(name);
  const basePath = storagePath ?? getDefaultStoragePath();
  const dbPath = getDatabasePath(name, basePath);

  if (!existsSync(basePath)) {
    mkdirSync(basePath, { recursive: true, mode: 0o700 });
  }

  if (existsSync(dbPath)) {
    throw new LedgerError(
      `Database "${name}" already exists at ${dbPath}`,
      LedgerErrorCode.DATABASE_ALREADY_EXISTS
    );
  }

  writeFileSync(dbPath, '', { mode: 0o600 });
  chmodSync(dbPath, 0o600);

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    removeDatabaseFile(dbPath, 'creation error');
    throw new LedgerError(
      `Failed to create database "${name}": ${describeError(error)}`,
      LedgerErrorCode.PERMISSION_DENIED,
      error
    );
  }

  try {
    configurePragmas(db, busyTimeoutMs);
    initializeDatabase(db);
    db.prepare('UPDATE ledger_metadata SET database_name = ? WHERE id = 1').run(name);
  } catch (error) {
    db.close();
    removeDatabaseFile(dbPath, 'init error');
    throw error;
  }

  return { db, name, path: dbPath };
}

/**
 * Open an existing ledger database, migrating it if needed
 * @throws LedgerError if database doesn't exist or schema is invalid
 */
export function openDatabase(
  name: string,
  storagePath?: string,
  busyTimeoutMs?: number
): OpenedDatabase {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new LedgerError(
      `Database "${name}" not found at ${dbPath}`,
      LedgerErrorCode.DATABASE_NOT_FOUND
    );
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new LedgerError(
      `Failed to open database "${name}": ${describeError(error)}`,
      LedgerErrorCode.DATABASE_LOCKED,
      error
    );
  }

  // Pragmas are per connection, not persisted
  try {
    configurePragmas(db, busyTimeoutMs);
    migrateToLatest(db);
  } catch (error) {
    db.close();
    throw error;
  }

  const verification = verifySchema(db);
  if (!verification.valid) {
    db.close();
    throw new LedgerError(
      `Database schema verification failed. Missing tables: ${verification.missingTables.join(', ')}. Missing indexes: ${verification.missingIndexes.join(', ')}. Missing columns: ${verification.missingColumns.join(', ')}`,
      LedgerErrorCode.SCHEMA_MISMATCH
    );
  }

  return { db, name, path: dbPath };
}

/** List all ledger databases in a storage directory */
export function listDatabases(storagePath?: string): LedgerDatabaseInfo[] {
  const basePath = storagePath ?? getDefaultStoragePath();
  if (!existsSync(basePath)) {
    console.error(
      `[static-operations] Storage directory does not exist: ${basePath}. Returning empty database list.`
    );
    return [];
  }

  const files = readdirSync(basePath).filter((f) => f.endsWith('.db'));
  const databases: LedgerDatabaseInfo[] = [];

  for (const file of files) {
    const name = file.slice(0, -'.db'.length);
    const dbPath = join(basePath, file);
    try {
      const stats = statSync(dbPath);
      const db = new Database(dbPath, { readonly: true });
      try {
        const row = db
          .prepare(
            'SELECT database_name, created_at, last_modified_at FROM ledger_metadata WHERE id = 1'
          )
          .get() as MetadataRow | undefined;
        const count = db.prepare('SELECT COUNT(*) AS count FROM files').get() as {
          count: number;
        };
        if (row) {
          databases.push({
            name,
            path: dbPath,
            size_bytes: stats.size,
            created_at: row.created_at,
            last_modified_at: row.last_modified_at,
            total_files: count.count,
          });
        }
      } finally {
        db.close();
      }
    } catch (error) {
      console.error(
        `[static-operations] Skipping unreadable database "${file}": ${describeError(error)}`
      );
    }
  }
  return databases;
}

/** Delete a ledger database and its WAL files */
export function deleteDatabase(name: string, storagePath?: string): void {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new LedgerError(
      `Database "${name}" not found at ${dbPath}`,
      LedgerErrorCode.DATABASE_NOT_FOUND
    );
  }

  unlinkSync(dbPath);
  for (const suffix of ['-wal', '-shm']) {
    const path = `${dbPath}${suffix}`;
    if (existsSync(path)) unlinkSync(path);
  }
}

/** Check if a ledger database exists */
export function databaseExists(name: string, storagePath?: string): boolean {
  try {
    validateName(name);
  } catch (error) {
    console.error('[static-operations] Invalid database name:', describeError(error));
    return false;
  }
  return existsSync(getDatabasePath(name, storagePath));
}
