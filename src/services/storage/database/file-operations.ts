/**
 * File operations for the ledger database
 *
 * CRUD on the files table and the checksum rows that hang off it.
 */

import type Database from 'better-sqlite3';
import type {
  ChecksumMap,
  FileIdentity,
  NewFileRow,
  StoredFile,
  UploadStatus,
} from '../../../models/file-record.js';
import type { FileDetailRow } from './types.js';
import { rowToStoredFile } from './converters.js';

const FILE_DETAIL_SELECT = `
  SELECT f.id, f.lfn, f.size, f.events, f.status, f.created_at, f.last_modified_at,
         d.path AS dataset_path,
         a.app_name, a.app_ver, a.app_fam, a.pset_hash, a.config_content,
         b.name AS block_name
  FROM files f
  JOIN algorithm_datasets ad ON ad.id = f.algorithm_dataset_id
  JOIN datasets d ON d.id = ad.dataset_id
  JOIN algorithms a ON a.id = ad.algorithm_id
  LEFT JOIN blocks b ON b.id = f.block_id
`;

/**
 * Insert a file row
 * @returns the assigned file id
 */
export function insertFile(db: Database.Database, file: NewFileRow): number {
  const result = db
    .prepare(
      `
      INSERT INTO files (id, lfn, size, events, algorithm_dataset_id, status, created_at, last_modified_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `
    )
    .run(
      file.id ?? null,
      file.lfn,
      file.size,
      file.events,
      file.algorithm_dataset_id,
      file.status,
      file.created_at,
      file.created_at
    );
  return Number(result.lastInsertRowid);
}

/**
 * Look a file up by LFN when known, otherwise by id
 * @returns the file id, or null when absent
 */
export function findFileId(db: Database.Database, identity: FileIdentity): number | null {
  let row: { id: number } | undefined;
  if (identity.lfn !== undefined) {
    row = db.prepare('SELECT id FROM files WHERE lfn = ?').get(identity.lfn) as
      | { id: number }
      | undefined;
  } else if (identity.id !== undefined) {
    row = db.prepare('SELECT id FROM files WHERE id = ?').get(identity.id) as
      | { id: number }
      | undefined;
  }
  return row?.id ?? null;
}

/**
 * Load the scalar state of a file by LFN when known, otherwise by id
 */
export function getFile(db: Database.Database, identity: FileIdentity): StoredFile | null {
  let row: FileDetailRow | undefined;
  if (identity.lfn !== undefined) {
    row = db.prepare(`${FILE_DETAIL_SELECT} WHERE f.lfn = ?`).get(identity.lfn) as
      | FileDetailRow
      | undefined;
  } else if (identity.id !== undefined) {
    row = db.prepare(`${FILE_DETAIL_SELECT} WHERE f.id = ?`).get(identity.id) as
      | FileDetailRow
      | undefined;
  }
  return row ? rowToStoredFile(row) : null;
}

/**
 * Delete a file and every row that belongs to it, including lineage edges
 * in both directions
 *
 * @returns true if a file row was deleted
 */
export function deleteFile(db: Database.Database, fileId: number): boolean {
  const row = db.prepare('SELECT lfn FROM files WHERE id = ?').get(fileId) as
    | { lfn: string }
    | undefined;
  if (!row) {
    return false;
  }

  db.prepare('DELETE FROM file_checksums WHERE file_id = ?').run(fileId);
  db.prepare('DELETE FROM file_run_lumis WHERE file_id = ?').run(fileId);
  db.prepare('DELETE FROM file_runs WHERE file_id = ?').run(fileId);
  db.prepare('DELETE FROM file_locations WHERE file_id = ?').run(fileId);
  db.prepare('DELETE FROM file_parents WHERE child_lfn = ? OR parent_lfn = ?').run(
    row.lfn,
    row.lfn
  );
  return db.prepare('DELETE FROM files WHERE id = ?').run(fileId).changes > 0;
}

/**
 * Insert or replace checksum digests for a file
 */
export function insertChecksums(
  db: Database.Database,
  fileId: number,
  checksums: ChecksumMap
): void {
  const stmt = db.prepare(`
    INSERT INTO file_checksums (file_id, type, digest) VALUES (?, ?, ?)
    ON CONFLICT(file_id, type) DO UPDATE SET digest = excluded.digest
  `);
  for (const [type, digest] of Object.entries(checksums)) {
    stmt.run(fileId, type, digest);
  }
}

export function getChecksums(db: Database.Database, fileId: number): ChecksumMap {
  const rows = db
    .prepare('SELECT type, digest FROM file_checksums WHERE file_id = ? ORDER BY type')
    .all(fileId) as Array<{ type: string; digest: string }>;
  const checksums: ChecksumMap = {};
  for (const row of rows) {
    checksums[row.type] = row.digest;
  }
  return checksums;
}

/**
 * Set the upload status of one file
 * @returns true if the file exists
 */
export function updateFileStatus(
  db: Database.Database,
  fileId: number,
  status: UploadStatus
): boolean {
  return (
    db
      .prepare('UPDATE files SET status = ?, last_modified_at = ? WHERE id = ?')
      .run(status, new Date().toISOString(), fileId).changes > 0
  );
}

export function countFiles(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM files').get() as { count: number };
  return row.count;
}
