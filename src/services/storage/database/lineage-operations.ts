/**
 * Lineage operations
 *
 * Edges are (child_lfn, parent_lfn) pairs. Neither end has to be a tracked
 * file: an edge declared before its files exist attaches to them once they
 * are created.
 */

import type Database from 'better-sqlite3';
import { ValidationError, LedgerErrorCode } from '../../../errors.js';
import { UPLOAD_STATUSES, type UploadStatus } from '../../../models/file-record.js';

/**
 * Check whether adding child -> parent would close a cycle, i.e. whether
 * the child is already the parent itself or one of its ancestors
 */
export function wouldCreateCycle(
  db: Database.Database,
  childLfn: string,
  parentLfn: string
): boolean {
  if (childLfn === parentLfn) {
    return true;
  }
  const row = db
    .prepare(
      `
      WITH RECURSIVE ancestors(lfn) AS (
        SELECT parent_lfn FROM file_parents WHERE child_lfn = ?
        UNION
        SELECT p.parent_lfn FROM file_parents p JOIN ancestors a ON p.child_lfn = a.lfn
      )
      SELECT 1 AS found FROM ancestors WHERE lfn = ? LIMIT 1
    `
    )
    .get(parentLfn, childLfn) as { found: number } | undefined;
  return row !== undefined;
}

/**
 * Record parent edges for a child. Existing edges are kept as they are.
 *
 * @throws ValidationError (LINEAGE_CYCLE) if an edge would make a file its own ancestor
 */
export function insertParents(
  db: Database.Database,
  childLfn: string,
  parentLfns: readonly string[]
): void {
  const stmt = db.prepare(
    'INSERT OR IGNORE INTO file_parents (child_lfn, parent_lfn, created_at) VALUES (?, ?, ?)'
  );
  const now = new Date().toISOString();
  for (const parentLfn of parentLfns) {
    if (wouldCreateCycle(db, childLfn, parentLfn)) {
      throw new ValidationError(
        `Lineage edge ${childLfn} -> ${parentLfn} would make "${childLfn}" its own ancestor`,
        LedgerErrorCode.LINEAGE_CYCLE
      );
    }
    stmt.run(childLfn, parentLfn, now);
  }
}

/**
 * @returns number of edges removed
 */
export function deleteParents(
  db: Database.Database,
  childLfn: string,
  parentLfns: readonly string[]
): number {
  const stmt = db.prepare('DELETE FROM file_parents WHERE child_lfn = ? AND parent_lfn = ?');
  let removed = 0;
  for (const parentLfn of parentLfns) {
    removed += stmt.run(childLfn, parentLfn).changes;
  }
  return removed;
}

export function getParentLfns(db: Database.Database, childLfn: string): string[] {
  const rows = db
    .prepare('SELECT parent_lfn FROM file_parents WHERE child_lfn = ? ORDER BY parent_lfn')
    .all(childLfn) as Array<{ parent_lfn: string }>;
  return rows.map((r) => r.parent_lfn);
}

export function getChildLfns(db: Database.Database, parentLfn: string): string[] {
  const rows = db
    .prepare('SELECT child_lfn FROM file_parents WHERE parent_lfn = ? ORDER BY child_lfn')
    .all(parentLfn) as Array<{ child_lfn: string }>;
  return rows.map((r) => r.child_lfn);
}

/**
 * Upload status of every parent of a file, in parent LFN order.
 * A parent that is not tracked has no status and yields null.
 */
export function getParentStatus(
  db: Database.Database,
  childLfn: string
): Array<UploadStatus | null> {
  const rows = db
    .prepare(
      `
      SELECT f.status FROM file_parents p
      LEFT JOIN files f ON f.lfn = p.parent_lfn
      WHERE p.child_lfn = ?
      ORDER BY p.parent_lfn
    `
    )
    .all(childLfn) as Array<{ status: string | null }>;

  return rows.map((r) => {
    if (r.status === null) {
      return null;
    }
    const status = UPLOAD_STATUSES.find((s) => s === r.status);
    if (status === undefined) {
      throw new Error(`Invalid UploadStatus "${r.status}" on a parent of ${childLfn}`);
    }
    return status;
  });
}
