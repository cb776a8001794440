/**
 * Block Manager
 *
 * Groups files into named blocks, the unit shipped to the catalog, and
 * tracks each block's status and location set. Blocks may be empty.
 *
 * @module ledger/block-manager
 */

import { v4 as uuidv4 } from 'uuid';
import { LedgerErrorCode, NotFoundError } from '../../errors.js';
import type { BlockInfo, BlockStatus } from '../../models/block.js';
import type { FileReference } from '../../models/file-record.js';
import {
  BlockNameSchema,
  BlockStatusSchema,
  DatasetPathSchema,
  LfnSchema,
  validateInput,
} from '../../utils/validation.js';
import type { QueryCatalog } from '../storage/query-catalog.js';
import { runInTransaction, type TransactionScope } from '../storage/transaction-scope.js';
import { normalizeSites, type SiteList } from './location-manager.js';

/**
 * Fresh block name for a dataset: `<datasetPath>#<uuid>`
 */
export function createBlockName(datasetPath: string): string {
  return `${validateInput(DatasetPathSchema, datasetPath)}#${uuidv4()}`;
}

export class BlockManager {
  constructor(private readonly catalog: QueryCatalog) {}

  /**
   * Put a file in a block, creating an OPEN block if the name is new.
   * A NOTUPLOADED file put in an OPEN block moves to PENDING.
   * @throws NotFoundError if the file does not exist
   */
  setBlock(scope: TransactionScope, lfn: string, blockName: string): void {
    const file = validateInput(LfnSchema, lfn);
    const block = validateInput(BlockNameSchema, blockName);
    runInTransaction(scope, () => {
      if (!this.catalog.execute('SetBlock', scope, file, block)) {
        throw new NotFoundError(`File ${file} not found`);
      }
    });
  }

  getBlock(scope: TransactionScope, lfn: string): string | null {
    return this.catalog.execute('GetBlock', scope, validateInput(LfnSchema, lfn));
  }

  /**
   * Create or update a block, setting its status and adding to its locations
   */
  setBlockStatus(
    scope: TransactionScope,
    blockName: string,
    locations: SiteList,
    status: BlockStatus = 'OPEN'
  ): void {
    const block = validateInput(BlockNameSchema, blockName);
    const blockStatus = validateInput(BlockStatusSchema, status);
    const sites = normalizeSites(locations);
    runInTransaction(scope, () => {
      this.catalog.execute('SetBlockStatus', scope, block, blockStatus, sites);
    });
  }

  getBlockInfo(scope: TransactionScope, blockName: string): BlockInfo | null {
    return this.catalog.execute('GetBlockInfo', scope, validateInput(BlockNameSchema, blockName));
  }

  /**
   * @throws NotFoundError (BLOCK_NOT_FOUND) if the block does not exist
   */
  updateBlockStatus(scope: TransactionScope, blockName: string, status: BlockStatus): void {
    const block = validateInput(BlockNameSchema, blockName);
    const blockStatus = validateInput(BlockStatusSchema, status);
    runInTransaction(scope, () => {
      if (!this.catalog.execute('UpdateBlockStatus', scope, block, blockStatus)) {
        throw new NotFoundError(`Block ${block} not found`, LedgerErrorCode.BLOCK_NOT_FOUND);
      }
    });
  }

  getBlockFiles(scope: TransactionScope, blockName: string): FileReference[] {
    return this.catalog.execute('GetBlockFiles', scope, validateInput(BlockNameSchema, blockName));
  }
}
