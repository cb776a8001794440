/**
 * Discovery operations for upload orchestration
 *
 * Read-side queries that pick what can go to the catalog next, plus the
 * bulk status transition applied once it has.
 */

import type Database from 'better-sqlite3';
import { NotFoundError } from '../../../errors.js';
import type { FileReference, UploadStatus } from '../../../models/file-record.js';

/**
 * Dataset paths with at least one NOTUPLOADED file
 */
export function findUploadableDatasets(db: Database.Database): string[] {
  const rows = db
    .prepare(
      `
      SELECT DISTINCT d.path FROM datasets d
      JOIN algorithm_datasets ad ON ad.dataset_id = d.id
      JOIN files f ON f.algorithm_dataset_id = ad.id
      WHERE f.status = 'NOTUPLOADED'
      ORDER BY d.path
    `
    )
    .all() as Array<{ path: string }>;
  return rows.map((r) => r.path);
}

/**
 * NOTUPLOADED files of a dataset whose tracked parents are all UPLOADED,
 * oldest first
 */
export function findUploadableFiles(
  db: Database.Database,
  datasetPath: string,
  maxFiles: number
): FileReference[] {
  return db
    .prepare(
      `
      SELECT f.id, f.lfn FROM files f
      JOIN algorithm_datasets ad ON ad.id = f.algorithm_dataset_id
      JOIN datasets d ON d.id = ad.dataset_id
      WHERE d.path = ?
        AND f.status = 'NOTUPLOADED'
        AND NOT EXISTS (
          SELECT 1 FROM file_parents p
          JOIN files pf ON pf.lfn = p.parent_lfn
          WHERE p.child_lfn = f.lfn AND pf.status != 'UPLOADED'
        )
      ORDER BY f.created_at, f.id
      LIMIT ?
    `
    )
    .all(datasetPath, maxFiles) as FileReference[];
}

/**
 * Move every listed file to a status. Unknown ids fail the whole call
 * before anything is written.
 *
 * @returns number of files updated
 * @throws NotFoundError naming the ids that do not exist
 */
export function updateFilesStatus(
  db: Database.Database,
  fileIds: readonly number[],
  status: UploadStatus
): number {
  const unique = [...new Set(fileIds)];
  const exists = db.prepare('SELECT 1 AS found FROM files WHERE id = ?');
  const missing = unique.filter((id) => exists.get(id) === undefined);
  if (missing.length > 0) {
    throw new NotFoundError(`Files not found: ${missing.join(', ')}`);
  }

  const update = db.prepare('UPDATE files SET status = ?, last_modified_at = ? WHERE id = ?');
  const now = new Date().toISOString();
  let updated = 0;
  for (const id of unique) {
    updated += update.run(status, now, id).changes;
  }
  return updated;
}
