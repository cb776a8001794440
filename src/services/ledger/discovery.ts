/**
 * Discovery queries for upload orchestration
 *
 * @module ledger/discovery
 */

import type { AlgorithmInfo, FileReference, UploadStatus } from '../../models/file-record.js';
import {
  DatasetPathSchema,
  FileIdListSchema,
  MaxFilesSchema,
  UploadStatusSchema,
  validateInput,
} from '../../utils/validation.js';
import type { QueryCatalog } from '../storage/query-catalog.js';
import { runInTransaction, type TransactionScope } from '../storage/transaction-scope.js';

export class DiscoveryQueries {
  constructor(
    private readonly catalog: QueryCatalog,
    private readonly defaultMaxFiles = 10
  ) {}

  /**
   * Dataset paths with at least one NOTUPLOADED file
   */
  findUploadableDatasets(scope: TransactionScope): string[] {
    return this.catalog.execute('FindUploadableDatasets', scope);
  }

  /**
   * Up to maxFiles NOTUPLOADED files of a dataset, oldest first, skipping
   * files with a tracked parent that has not been uploaded
   */
  findUploadableFiles(
    scope: TransactionScope,
    datasetPath: string,
    maxFiles: number = this.defaultMaxFiles
  ): FileReference[] {
    return this.catalog.execute(
      'FindUploadableFiles',
      scope,
      validateInput(DatasetPathSchema, datasetPath),
      validateInput(MaxFilesSchema, maxFiles)
    );
  }

  findAlgos(scope: TransactionScope, datasetPath: string): AlgorithmInfo[] {
    return this.catalog.execute('FindAlgos', scope, validateInput(DatasetPathSchema, datasetPath));
  }

  /**
   * Move files to a status, all or none
   *
   * @returns number of files updated
   * @throws NotFoundError if any id is unknown; nothing is written
   */
  updateFilesStatus(
    scope: TransactionScope,
    fileIds: readonly number[],
    status: UploadStatus = 'UPLOADED'
  ): number {
    const ids = validateInput(FileIdListSchema, fileIds);
    const newStatus = validateInput(UploadStatusSchema, status);
    if (ids.length === 0) return 0;
    return runInTransaction(scope, () =>
      this.catalog.execute('UpdateFilesStatus', scope, ids, newStatus)
    );
  }

  countFiles(scope: TransactionScope): number {
    return this.catalog.execute('CountFiles', scope);
  }
}
