/**
 * Schema Verification Functions
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

// Columns most likely to be missing after a partial migration
const REQUIRED_COLUMNS: Record<string, string[]> = {
  files: ['id', 'lfn', 'size', 'events', 'algorithm_dataset_id', 'block_id', 'status'],
  algorithms: ['id', 'app_name', 'app_ver', 'app_fam', 'pset_hash', 'config_content'],
  file_parents: ['child_lfn', 'parent_lfn'],
  blocks: ['id', 'name', 'status'],
};

/**
 * Verify all required tables, indexes and columns exist
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
} {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];

  const tableStmt = db.prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`);
  const indexStmt = db.prepare(`SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?`);

  for (const tableName of REQUIRED_TABLES) {
    if (!tableStmt.get(tableName)) {
      missingTables.push(tableName);
    }
  }

  for (const indexName of REQUIRED_INDEXES) {
    if (!indexStmt.get(indexName)) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!tableStmt.get(table)) {
      continue; // already reported as a missing table
    }
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`Table "${table}" is missing required column: ${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
