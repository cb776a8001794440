/**
 * Query Catalog
 *
 * Named ledger operations, one implementation table per backend dialect.
 * The table is picked once when a database is opened; entity code asks for
 * an operation by name and runs it against the connection of the scope it
 * was handed. SQLite failures are translated into ledger errors here.
 *
 * @module storage/query-catalog
 */

import type Database from 'better-sqlite3';
import type {
  AlgorithmInfo,
  ChecksumMap,
  FileIdentity,
  FileReference,
  NewFileRow,
  StoredFile,
  UploadStatus,
} from '../../models/file-record.js';
import type { BlockInfo, BlockStatus } from '../../models/block.js';
import type { Run } from '../../models/run.js';
import { LedgerError, LedgerErrorCode } from '../../errors.js';
import type { LedgerDialect } from '../../utils/config.js';
import type { TransactionScope } from './transaction-scope.js';
import { translateStoreError } from './database/helpers.js';
import * as algorithmOps from './database/algorithm-operations.js';
import * as fileOps from './database/file-operations.js';
import * as runOps from './database/run-operations.js';
import * as locationOps from './database/location-operations.js';
import * as lineageOps from './database/lineage-operations.js';
import * as blockOps from './database/block-operations.js';
import * as discoveryOps from './database/discovery-operations.js';

/**
 * Argument and result types of every named operation
 */
export interface QuerySignatures {
  AddDataset: { args: [path: string]; result: number };
  AddAlgorithm: { args: [algorithm: AlgorithmInfo]; result: number };
  AssociateAlgorithmDataset: { args: [algorithmId: number, datasetId: number]; result: number };
  FindAlgos: { args: [datasetPath: string]; result: AlgorithmInfo[] };

  AddFile: { args: [file: NewFileRow]; result: number };
  FileExists: { args: [identity: FileIdentity]; result: number | null };
  GetFile: { args: [identity: FileIdentity]; result: StoredFile | null };
  DeleteFile: { args: [fileId: number]; result: boolean };
  AddChecksums: { args: [fileId: number, checksums: ChecksumMap]; result: void };
  GetChecksums: { args: [fileId: number]; result: ChecksumMap };
  SetFileStatus: { args: [fileId: number, status: UploadStatus]; result: boolean };
  CountFiles: { args: []; result: number };

  AddRuns: { args: [fileId: number, runs: readonly Run[]]; result: void };
  GetRuns: { args: [fileId: number]; result: Run[] };

  AddLocation: { args: [siteName: string]; result: number };
  SetFileLocations: { args: [fileId: number, siteNames: readonly string[]]; result: void };
  GetFileLocations: { args: [fileId: number]; result: string[] };
  ListLocations: { args: []; result: string[] };

  AddParents: { args: [childLfn: string, parentLfns: readonly string[]]; result: void };
  DeleteParents: { args: [childLfn: string, parentLfns: readonly string[]]; result: number };
  GetParents: { args: [childLfn: string]; result: string[] };
  GetChildren: { args: [parentLfn: string]; result: string[] };
  GetParentStatus: { args: [childLfn: string]; result: Array<UploadStatus | null> };

  SetBlock: { args: [lfn: string, blockName: string]; result: boolean };
  GetBlock: { args: [lfn: string]; result: string | null };
  SetBlockStatus: {
    args: [blockName: string, status: BlockStatus, siteNames: readonly string[]];
    result: number;
  };
  GetBlockInfo: { args: [blockName: string]; result: BlockInfo | null };
  UpdateBlockStatus: { args: [blockName: string, status: BlockStatus]; result: boolean };
  GetBlockFiles: { args: [blockName: string]; result: FileReference[] };

  FindUploadableDatasets: { args: []; result: string[] };
  FindUploadableFiles: { args: [datasetPath: string, maxFiles: number]; result: FileReference[] };
  UpdateFilesStatus: {
    args: [fileIds: readonly number[], status: UploadStatus];
    result: number;
  };
}

export type QueryName = keyof QuerySignatures;
export type QueryArgs<K extends QueryName> = QuerySignatures[K]['args'];
export type QueryResult<K extends QueryName> = QuerySignatures[K]['result'];

/**
 * One dialect's implementation of every named operation
 */
export type LedgerQueries = {
  readonly [K in QueryName]: (db: Database.Database, ...args: QueryArgs<K>) => QueryResult<K>;
};

const SQLITE_QUERIES: LedgerQueries = {
  AddDataset: algorithmOps.insertDataset,
  AddAlgorithm: algorithmOps.insertAlgorithm,
  AssociateAlgorithmDataset: algorithmOps.associateAlgorithmDataset,
  FindAlgos: algorithmOps.findAlgorithmsByDataset,

  AddFile: fileOps.insertFile,
  FileExists: fileOps.findFileId,
  GetFile: fileOps.getFile,
  DeleteFile: fileOps.deleteFile,
  AddChecksums: fileOps.insertChecksums,
  GetChecksums: fileOps.getChecksums,
  SetFileStatus: fileOps.updateFileStatus,
  CountFiles: fileOps.countFiles,

  AddRuns: runOps.insertRuns,
  GetRuns: runOps.getRuns,

  AddLocation: locationOps.insertLocation,
  SetFileLocations: locationOps.insertFileLocations,
  GetFileLocations: locationOps.getFileLocations,
  ListLocations: locationOps.listLocations,

  AddParents: lineageOps.insertParents,
  DeleteParents: lineageOps.deleteParents,
  GetParents: lineageOps.getParentLfns,
  GetChildren: lineageOps.getChildLfns,
  GetParentStatus: lineageOps.getParentStatus,

  SetBlock: blockOps.assignFileToBlock,
  GetBlock: blockOps.getFileBlock,
  SetBlockStatus: blockOps.upsertBlock,
  GetBlockInfo: blockOps.getBlockInfo,
  UpdateBlockStatus: blockOps.updateBlockStatus,
  GetBlockFiles: blockOps.getBlockFiles,

  FindUploadableDatasets: discoveryOps.findUploadableDatasets,
  FindUploadableFiles: discoveryOps.findUploadableFiles,
  UpdateFilesStatus: discoveryOps.updateFilesStatus,
};

const DIALECTS: Readonly<Record<LedgerDialect, LedgerQueries>> = {
  sqlite: SQLITE_QUERIES,
};

export class QueryCatalog {
  constructor(
    readonly dialect: LedgerDialect,
    private readonly queries: LedgerQueries
  ) {}

  /**
   * Run a named operation on the scope's connection
   */
  execute<K extends QueryName>(
    name: K,
    scope: TransactionScope,
    ...args: QueryArgs<K>
  ): QueryResult<K> {
    if (scope.connection.inTransaction && !scope.inTransaction) {
      throw new LedgerError(
        `${name}: the connection is inside a transaction opened by another scope`,
        LedgerErrorCode.TRANSACTION_STATE
      );
    }
    const operation: LedgerQueries[K] = this.queries[name];
    try {
      return operation(scope.connection, ...args);
    } catch (error) {
      throw translateStoreError(error, name);
    }
  }

  /**
   * Bind a named operation to a scope
   */
  resolve<K extends QueryName>(
    name: K,
    scope: TransactionScope
  ): (...args: QueryArgs<K>) => QueryResult<K> {
    return (...args) => this.execute(name, scope, ...args);
  }
}

const catalogs = new Map<LedgerDialect, QueryCatalog>();

/**
 * Shared catalog for a dialect
 */
export function getQueryCatalog(dialect: LedgerDialect): QueryCatalog {
  let catalog = catalogs.get(dialect);
  if (!catalog) {
    catalog = new QueryCatalog(dialect, DIALECTS[dialect]);
    catalogs.set(dialect, catalog);
  }
  return catalog;
}
