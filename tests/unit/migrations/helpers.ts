/**
 * Shared Test Helpers for Database Migrations Tests
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import os from 'os';

export function getTableColumns(db: Database.Database, tableName: string): string[] {
  const result = db.prepare(`PRAGMA table_info(${tableName})`).all() as Array<{ name: string }>;
  return result.map((row) => row.name);
}

export function getTableNames(db: Database.Database): string[] {
  const result = db
    .prepare(
      `
    SELECT name FROM sqlite_master
    WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `
    )
    .all() as Array<{ name: string }>;
  return result.map((row) => row.name);
}

export function getIndexNames(db: Database.Database): string[] {
  const result = db
    .prepare(
      `
    SELECT name FROM sqlite_master
    WHERE type = 'index' AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `
    )
    .all() as Array<{ name: string }>;
  return result.map((row) => row.name);
}

export function getPragmaValue(db: Database.Database, pragma: string): unknown {
  const result = db.prepare(`PRAGMA ${pragma}`).get() as Record<string, unknown> | undefined;
  return result ? Object.values(result)[0] : undefined;
}

/**
 * Create a unique test directory
 */
export function createTestDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function cleanupTestDir(testDir: string): void {
  try {
    fs.rmSync(testDir, { recursive: true, force: true });
  } catch (error) {
    console.error(`[migration-tests] Failed to remove ${testDir}:`, error);
  }
}

/**
 * Create a fresh, uninitialized database file
 */
export function createTestDb(testDir: string): { db: Database.Database; dbPath: string } {
  const dbPath = path.join(
    testDir,
    `test-${String(Date.now())}-${Math.random().toString(36).slice(2)}.db`
  );
  const db = new Database(dbPath);
  return { db, dbPath };
}

export function closeDb(db: Database.Database | undefined): void {
  if (db?.open) {
    db.close();
  }
}

/**
 * Insert the dataset/algorithm/association chain a file row needs
 * @returns the algorithm_datasets id
 */
export function insertTestAssociation(db: Database.Database): number {
  const now = new Date().toISOString();
  const dataset = db
    .prepare('INSERT INTO datasets (path, created_at) VALUES (?, ?)')
    .run('/A/B/RECO', now).lastInsertRowid;
  const algorithm = db
    .prepare(
      `INSERT INTO algorithms (app_name, app_ver, app_fam, pset_hash, config_content, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    )
    .run('X', '1.0', 'RECO', 'H', 'C', now).lastInsertRowid;
  return Number(
    db
      .prepare('INSERT INTO algorithm_datasets (algorithm_id, dataset_id) VALUES (?, ?)')
      .run(algorithm, dataset).lastInsertRowid
  );
}

export function insertTestFileRow(
  db: Database.Database,
  lfn: string,
  algorithmDatasetId: number,
  status: string = 'NOTUPLOADED'
): void {
  const now = new Date().toISOString();
  db.prepare(
    `INSERT INTO files (lfn, size, events, algorithm_dataset_id, status, created_at, last_modified_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  ).run(lfn, 1024, 100, algorithmDatasetId, status, now, now);
}
