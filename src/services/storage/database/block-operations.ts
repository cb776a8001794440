/**
 * Block operations
 *
 * A block is created on first use, either by assigning a file to it or by
 * setting its status and locations.
 */

import type Database from 'better-sqlite3';
import type { BlockInfo, BlockStatus } from '../../../models/block.js';
import type { FileReference } from '../../../models/file-record.js';
import type { BlockRow } from './types.js';
import { rowToBlockInfo } from './converters.js';
import { insertLocation } from './location-operations.js';

function requireBlockId(db: Database.Database, name: string): number {
  const row = db.prepare('SELECT id FROM blocks WHERE name = ?').get(name) as
    | { id: number }
    | undefined;
  if (!row) {
    throw new Error(`Block "${name}" missing after insert`);
  }
  return row.id;
}

/**
 * Create an OPEN block if the name is unseen
 * @returns the block id
 */
export function ensureBlock(db: Database.Database, name: string): number {
  db.prepare(
    "INSERT INTO blocks (name, status, created_at) VALUES (?, 'OPEN', ?) ON CONFLICT(name) DO NOTHING"
  ).run(name, new Date().toISOString());
  return requireBlockId(db, name);
}

/**
 * Create or update a block with a status and add sites to its location set
 * @returns the block id
 */
export function upsertBlock(
  db: Database.Database,
  name: string,
  status: BlockStatus,
  siteNames: readonly string[]
): number {
  db.prepare(
    `
    INSERT INTO blocks (name, status, created_at) VALUES (?, ?, ?)
    ON CONFLICT(name) DO UPDATE SET status = excluded.status
  `
  ).run(name, status, new Date().toISOString());

  const id = requireBlockId(db, name);
  const stmt = db.prepare(
    'INSERT OR IGNORE INTO block_locations (block_id, location_id) VALUES (?, ?)'
  );
  for (const siteName of siteNames) {
    stmt.run(id, insertLocation(db, siteName));
  }
  return id;
}

/**
 * Assign a file to a block, creating the block if needed. A NOTUPLOADED
 * file joining an OPEN block becomes PENDING.
 * @returns false if no file has the LFN
 */
export function assignFileToBlock(db: Database.Database, lfn: string, blockName: string): boolean {
  const file = db.prepare('SELECT id FROM files WHERE lfn = ?').get(lfn) as
    | { id: number }
    | undefined;
  if (!file) {
    return false;
  }
  const id = ensureBlock(db, blockName);
  db.prepare(
    `
    UPDATE files SET
      block_id = ?,
      status = CASE
        WHEN status = 'NOTUPLOADED' AND (SELECT status FROM blocks WHERE id = ?) = 'OPEN'
        THEN 'PENDING'
        ELSE status
      END,
      last_modified_at = ?
    WHERE id = ?
  `
  ).run(id, id, new Date().toISOString(), file.id);
  return true;
}

/**
 * Name of the block a file belongs to; null when the file has none or is absent
 */
export function getFileBlock(db: Database.Database, lfn: string): string | null {
  const row = db
    .prepare(
      `
      SELECT b.name FROM files f
      JOIN blocks b ON b.id = f.block_id
      WHERE f.lfn = ?
    `
    )
    .get(lfn) as { name: string } | undefined;
  return row?.name ?? null;
}

export function getBlockLocations(db: Database.Database, id: number): string[] {
  const rows = db
    .prepare(
      `
      SELECT l.site_name FROM block_locations bl
      JOIN locations l ON l.id = bl.location_id
      WHERE bl.block_id = ?
      ORDER BY l.site_name
    `
    )
    .all(id) as Array<{ site_name: string }>;
  return rows.map((r) => r.site_name);
}

export function getBlockInfo(db: Database.Database, name: string): BlockInfo | null {
  const row = db
    .prepare(
      `
      SELECT b.id, b.name, b.status, b.created_at,
             (SELECT COUNT(*) FROM files f WHERE f.block_id = b.id) AS file_count
      FROM blocks b
      WHERE b.name = ?
    `
    )
    .get(name) as BlockRow | undefined;
  return row ? rowToBlockInfo(row, getBlockLocations(db, row.id)) : null;
}

/**
 * @returns false if the block does not exist
 */
export function updateBlockStatus(
  db: Database.Database,
  name: string,
  status: BlockStatus
): boolean {
  return db.prepare('UPDATE blocks SET status = ? WHERE name = ?').run(status, name).changes > 0;
}

export function getBlockFiles(db: Database.Database, name: string): FileReference[] {
  return db
    .prepare(
      `
      SELECT f.id, f.lfn FROM files f
      JOIN blocks b ON b.id = f.block_id
      WHERE b.name = ?
      ORDER BY f.id
    `
    )
    .all(name) as FileReference[];
}
