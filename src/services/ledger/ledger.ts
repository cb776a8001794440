/**
 * UploadLedger - managers bound to one open ledger database
 *
 * @module ledger/ledger
 */

import { LedgerDatabase } from '../storage/database/service.js';
import type { TransactionScope } from '../storage/transaction-scope.js';
import { BlockManager } from './block-manager.js';
import { DiscoveryQueries } from './discovery.js';
import { FileRecord, type FileRecordInit } from './file-record.js';
import { LineageManager } from './lineage-manager.js';
import { LocationManager } from './location-manager.js';

export class UploadLedger {
  readonly lineage: LineageManager;
  readonly locations: LocationManager;
  readonly blocks: BlockManager;
  readonly discovery: DiscoveryQueries;

  constructor(readonly database: LedgerDatabase) {
    const catalog = database.catalog;
    this.lineage = new LineageManager(catalog);
    this.locations = new LocationManager(catalog);
    this.blocks = new BlockManager(catalog);
    this.discovery = new DiscoveryQueries(catalog, database.config.maxUploadableFiles);
  }

  static create(name: string, storagePath?: string): UploadLedger {
    return new UploadLedger(LedgerDatabase.create(name, storagePath));
  }

  static open(name: string, storagePath?: string): UploadLedger {
    return new UploadLedger(LedgerDatabase.open(name, storagePath));
  }

  createScope(): TransactionScope {
    return this.database.createScope();
  }

  /**
   * New in-memory record bound to this ledger's query catalog
   */
  file(init: FileRecordInit): FileRecord {
    return new FileRecord(this.database.catalog, init);
  }

  close(): void {
    this.database.close();
  }
}
