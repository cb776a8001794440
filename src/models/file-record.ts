/**
 * File record interfaces for the upload ledger
 *
 * A tracked file is identified by an integer id (assigned on creation)
 * and/or its logical file name (LFN).
 */

/**
 * Upload status of a tracked file
 *
 * NOTUPLOADED - waiting for the catalog (initial)
 * PENDING     - assigned to an open block, awaiting upload
 * UPLOADED    - registered in the catalog
 */
export const UPLOAD_STATUSES = ['NOTUPLOADED', 'PENDING', 'UPLOADED'] as const;

export type UploadStatus = (typeof UPLOAD_STATUSES)[number];

export const INITIAL_UPLOAD_STATUS: UploadStatus = 'NOTUPLOADED';

/**
 * The application that produced a file. Identified by
 * (appName, appVer, appFam, psetHash); configContent rides along.
 */
export interface AlgorithmInfo {
  appName: string;
  appVer: string;
  appFam: string;
  psetHash: string;
  configContent: string;
}

/**
 * Identity used to look a file up: id, LFN, or both
 */
export interface FileIdentity {
  id?: number;
  lfn?: string;
}

/**
 * A fully resolved identity, as returned by discovery queries
 */
export interface FileReference {
  id: number;
  lfn: string;
}

/**
 * Checksum algorithm name -> digest
 */
export type ChecksumMap = Record<string, string>;

/**
 * Scalar state of a stored file, as read back from the ledger
 */
export interface StoredFile {
  id: number;
  lfn: string;
  size: number;
  events: number;
  status: UploadStatus;
  dataset_path: string;
  algorithm: AlgorithmInfo;
  block_name: string | null;
  created_at: string;
  last_modified_at: string;
}

/**
 * Insert payload for a new file row. Without an id the store assigns one.
 */
export interface NewFileRow {
  id?: number;
  lfn: string;
  size: number;
  events: number;
  algorithm_dataset_id: number;
  status: UploadStatus;
  created_at: string;
}
