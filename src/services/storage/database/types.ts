/**
 * Type definitions for the ledger database
 *
 * Row shapes returned by better-sqlite3 and the statistics interfaces.
 */

import type { BlockStatus } from '../../../models/block.js';
import type { UploadStatus } from '../../../models/file-record.js';

/**
 * Ledger database information
 */
export interface LedgerDatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  created_at: string;
  last_modified_at: string;
  total_files: number;
}

/**
 * Ledger statistics
 */
export interface LedgerStats {
  name: string;
  total_files: number;
  files_by_status: Record<UploadStatus, number>;
  total_blocks: number;
  blocks_by_status: Record<BlockStatus, number>;
  total_datasets: number;
  total_algorithms: number;
  total_locations: number;
  total_parent_edges: number;
  storage_size_bytes: number;
}

/**
 * files joined with dataset, algorithm and block
 */
export interface FileDetailRow {
  id: number;
  lfn: string;
  size: number;
  events: number;
  status: string;
  created_at: string;
  last_modified_at: string;
  dataset_path: string;
  app_name: string;
  app_ver: string;
  app_fam: string;
  pset_hash: string;
  config_content: string;
  block_name: string | null;
}

export interface AlgorithmRow {
  app_name: string;
  app_ver: string;
  app_fam: string;
  pset_hash: string;
  config_content: string;
}

export interface BlockRow {
  id: number;
  name: string;
  status: string;
  created_at: string;
  file_count: number;
}

export interface RunLumiRow {
  run: number;
  lumi: number | null;
}

export interface MetadataRow {
  database_name: string;
  created_at: string;
  last_modified_at: string;
}
