/**
 * Statistics operations for LedgerDatabase
 *
 * Handles ledger statistics retrieval.
 */

import type Database from 'better-sqlite3';
import { statSync } from 'fs';
import type { LedgerStats } from './types.js';

/**
 * Get ledger statistics
 *
 * @param name - Database name
 * @param path - Database file path
 * @returns Live statistics from the database
 */
export function getStats(db: Database.Database, name: string, path: string): LedgerStats {
  const fileStats = db
    .prepare(
      `
    SELECT
      COUNT(*) FILTER (WHERE status = 'NOTUPLOADED') as notuploaded,
      COUNT(*) FILTER (WHERE status = 'PENDING') as pending,
      COUNT(*) FILTER (WHERE status = 'UPLOADED') as uploaded,
      COUNT(*) as total
    FROM files
  `
    )
    .get() as { notuploaded: number; pending: number; uploaded: number; total: number };

  const blockStats = db
    .prepare(
      `
    SELECT
      COUNT(*) FILTER (WHERE status = 'OPEN') as open,
      COUNT(*) FILTER (WHERE status = 'CLOSED') as closed,
      COUNT(*) FILTER (WHERE status = 'UPLOADED') as uploaded,
      COUNT(*) as total
    FROM blocks
  `
    )
    .get() as { open: number; closed: number; uploaded: number; total: number };

  const otherCounts = db
    .prepare(
      `
    SELECT
      (SELECT COUNT(*) FROM datasets) as dataset_count,
      (SELECT COUNT(*) FROM algorithms) as algorithm_count,
      (SELECT COUNT(*) FROM locations) as location_count,
      (SELECT COUNT(*) FROM file_parents) as edge_count
  `
    )
    .get() as {
    dataset_count: number;
    algorithm_count: number;
    location_count: number;
    edge_count: number;
  };

  const stats = statSync(path);

  return {
    name,
    total_files: fileStats.total,
    files_by_status: {
      NOTUPLOADED: fileStats.notuploaded,
      PENDING: fileStats.pending,
      UPLOADED: fileStats.uploaded,
    },
    total_blocks: blockStats.total,
    blocks_by_status: {
      OPEN: blockStats.open,
      CLOSED: blockStats.closed,
      UPLOADED: blockStats.uploaded,
    },
    total_datasets: otherCounts.dataset_count,
    total_algorithms: otherCounts.algorithm_count,
    total_locations: otherCounts.location_count,
    total_parent_edges: otherCounts.edge_count,
    storage_size_bytes: stats.size,
  };
}

/**
 * Update metadata last_modified_at timestamp
 */
export function updateMetadataModified(db: Database.Database): void {
  db.prepare('UPDATE ledger_metadata SET last_modified_at = ? WHERE id = 1').run(
    new Date().toISOString()
  );
}
