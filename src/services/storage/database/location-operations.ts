/**
 * Location (storage site) operations
 */

import type Database from 'better-sqlite3';

/**
 * Register a storage site if unseen
 * @returns the location id
 */
export function insertLocation(db: Database.Database, siteName: string): number {
  db.prepare('INSERT OR IGNORE INTO locations (site_name) VALUES (?)').run(siteName);
  const row = db.prepare('SELECT id FROM locations WHERE site_name = ?').get(siteName) as {
    id: number;
  };
  return row.id;
}

/**
 * Add sites to a file's replica set. Sites already recorded are skipped.
 */
export function insertFileLocations(
  db: Database.Database,
  fileId: number,
  siteNames: readonly string[]
): void {
  const stmt = db.prepare(
    'INSERT OR IGNORE INTO file_locations (file_id, location_id) VALUES (?, ?)'
  );
  for (const siteName of siteNames) {
    stmt.run(fileId, insertLocation(db, siteName));
  }
}

export function getFileLocations(db: Database.Database, fileId: number): string[] {
  const rows = db
    .prepare(
      `
      SELECT l.site_name FROM file_locations fl
      JOIN locations l ON l.id = fl.location_id
      WHERE fl.file_id = ?
      ORDER BY l.site_name
    `
    )
    .all(fileId) as Array<{ site_name: string }>;
  return rows.map((r) => r.site_name);
}

export function listLocations(db: Database.Database): string[] {
  const rows = db.prepare('SELECT site_name FROM locations ORDER BY site_name').all() as Array<{
    site_name: string;
  }>;
  return rows.map((r) => r.site_name);
}
