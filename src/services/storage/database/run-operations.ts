/**
 * Run/lumi operations
 *
 * Inserts are idempotent: a run or lumi already recorded for a file is skipped.
 */

import type Database from 'better-sqlite3';
import type { Run } from '../../../models/run.js';
import type { RunLumiRow } from './types.js';
import { rowsToRuns } from './converters.js';

export function insertRuns(db: Database.Database, fileId: number, runs: readonly Run[]): void {
  const runStmt = db.prepare('INSERT OR IGNORE INTO file_runs (file_id, run) VALUES (?, ?)');
  const lumiStmt = db.prepare(
    'INSERT OR IGNORE INTO file_run_lumis (file_id, run, lumi) VALUES (?, ?, ?)'
  );
  for (const run of runs) {
    runStmt.run(fileId, run.run);
    for (const lumi of run.lumis) {
      lumiStmt.run(fileId, run.run, lumi);
    }
  }
}

export function getRuns(db: Database.Database, fileId: number): Run[] {
  const rows = db
    .prepare(
      `
      SELECT r.run, l.lumi
      FROM file_runs r
      LEFT JOIN file_run_lumis l ON l.file_id = r.file_id AND l.run = r.run
      WHERE r.file_id = ?
      ORDER BY r.run, l.lumi
    `
    )
    .all(fileId) as RunLumiRow[];
  return rowsToRuns(rows);
}
