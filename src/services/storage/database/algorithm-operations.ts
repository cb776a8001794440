/**
 * Dataset and algorithm operations
 *
 * Datasets and algorithms are shared rows: inserting an existing
 * path or tuple returns the existing id.
 */

import type Database from 'better-sqlite3';
import type { AlgorithmInfo } from '../../../models/file-record.js';
import { LedgerError, LedgerErrorCode } from '../../../errors.js';
import type { AlgorithmRow } from './types.js';
import { rowToAlgorithm } from './converters.js';

function requireId(row: { id: number } | undefined, what: string): number {
  if (!row) {
    throw new LedgerError(`${what} row missing after insert`, LedgerErrorCode.SCHEMA_MISMATCH);
  }
  return row.id;
}

/**
 * Insert a dataset path if unseen
 * @returns the dataset id
 */
export function insertDataset(db: Database.Database, path: string): number {
  db.prepare(
    'INSERT INTO datasets (path, created_at) VALUES (?, ?) ON CONFLICT(path) DO NOTHING'
  ).run(path, new Date().toISOString());

  const row = db.prepare('SELECT id FROM datasets WHERE path = ?').get(path) as
    | { id: number }
    | undefined;
  return requireId(row, `Dataset "${path}"`);
}

/**
 * Insert an algorithm if its four-tuple is unseen. The first
 * configContent stored for a tuple is kept.
 * @returns the algorithm id
 */
export function insertAlgorithm(db: Database.Database, algorithm: AlgorithmInfo): number {
  db.prepare(
    `
    INSERT INTO algorithms (app_name, app_ver, app_fam, pset_hash, config_content, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(app_name, app_ver, app_fam, pset_hash) DO NOTHING
  `
  ).run(
    algorithm.appName,
    algorithm.appVer,
    algorithm.appFam,
    algorithm.psetHash,
    algorithm.configContent,
    new Date().toISOString()
  );

  const row = db
    .prepare(
      'SELECT id FROM algorithms WHERE app_name = ? AND app_ver = ? AND app_fam = ? AND pset_hash = ?'
    )
    .get(algorithm.appName, algorithm.appVer, algorithm.appFam, algorithm.psetHash) as
    | { id: number }
    | undefined;
  return requireId(row, `Algorithm ${algorithm.appName}/${algorithm.appVer}`);
}

/**
 * Link an algorithm to a dataset
 * @returns the association id files reference
 */
export function associateAlgorithmDataset(
  db: Database.Database,
  algorithmId: number,
  datasetId: number
): number {
  db.prepare(
    `
    INSERT INTO algorithm_datasets (algorithm_id, dataset_id) VALUES (?, ?)
    ON CONFLICT(algorithm_id, dataset_id) DO NOTHING
  `
  ).run(algorithmId, datasetId);

  const row = db
    .prepare('SELECT id FROM algorithm_datasets WHERE algorithm_id = ? AND dataset_id = ?')
    .get(algorithmId, datasetId) as { id: number } | undefined;
  return requireId(row, 'Algorithm/dataset association');
}

/**
 * Distinct algorithms used by files of a dataset
 */
export function findAlgorithmsByDataset(
  db: Database.Database,
  datasetPath: string
): AlgorithmInfo[] {
  const rows = db
    .prepare(
      `
      SELECT DISTINCT a.app_name, a.app_ver, a.app_fam, a.pset_hash, a.config_content
      FROM algorithms a
      JOIN algorithm_datasets ad ON ad.algorithm_id = a.id
      JOIN datasets d ON d.id = ad.dataset_id
      JOIN files f ON f.algorithm_dataset_id = ad.id
      WHERE d.path = ?
      ORDER BY a.app_name, a.app_ver, a.app_fam, a.pset_hash
    `
    )
    .all(datasetPath) as AlgorithmRow[];
  return rows.map(rowToAlgorithm);
}
