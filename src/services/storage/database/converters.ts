/**
 * Row conversion functions for the ledger database
 *
 * Converts database row objects to domain model interfaces.
 */

import { UPLOAD_STATUSES, type AlgorithmInfo, type StoredFile } from '../../../models/file-record.js';
import { BLOCK_STATUSES, type BlockInfo } from '../../../models/block.js';
import { Run } from '../../../models/run.js';
import type { AlgorithmRow, BlockRow, FileDetailRow, RunLumiRow } from './types.js';

/**
 * Validate that a string value is a member of a union type at runtime.
 * Throws rather than let a corrupt value through.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: number | string
): T {
  const match = validValues.find((v) => v === value);
  if (match === undefined) {
    throw new Error(
      `Invalid ${fieldName} "${value}" in record ${String(id)}. Valid values: ${validValues.join(', ')}`
    );
  }
  return match;
}

export function rowToAlgorithm(row: AlgorithmRow): AlgorithmInfo {
  return {
    appName: row.app_name,
    appVer: row.app_ver,
    appFam: row.app_fam,
    psetHash: row.pset_hash,
    configContent: row.config_content,
  };
}

export function rowToStoredFile(row: FileDetailRow): StoredFile {
  return {
    id: row.id,
    lfn: row.lfn,
    size: row.size,
    events: row.events,
    status: validateEnum(row.status, UPLOAD_STATUSES, 'UploadStatus', row.id),
    dataset_path: row.dataset_path,
    algorithm: rowToAlgorithm(row),
    block_name: row.block_name,
    created_at: row.created_at,
    last_modified_at: row.last_modified_at,
  };
}

export function rowToBlockInfo(row: BlockRow, locations: string[]): BlockInfo {
  return {
    id: row.id,
    name: row.name,
    status: validateEnum(row.status, BLOCK_STATUSES, 'BlockStatus', row.name),
    locations,
    file_count: row.file_count,
    created_at: row.created_at,
  };
}

/**
 * Fold run/lumi rows (one per lumi, or one with a null lumi for a bare run)
 * into Run objects ordered by run number
 */
export function rowsToRuns(rows: RunLumiRow[]): Run[] {
  const runs = new Map<number, Run>();
  for (const row of rows) {
    let run = runs.get(row.run);
    if (!run) {
      run = new Run(row.run);
      runs.set(row.run, run);
    }
    if (row.lumi !== null) {
      run.merge(new Run(row.run, row.lumi));
    }
  }
  return [...runs.values()].sort((a, b) => a.run - b.run);
}
