/**
 * Ledger Module
 *
 * File records, lineage, locations, blocks and discovery over a ledger database.
 */

export { UploadLedger } from './ledger.js';
export {
  FileRecord,
  type FileRecordInit,
  type LoadOptions,
  type SetLocationOptions,
} from './file-record.js';
export { LineageManager } from './lineage-manager.js';
export {
  LocationManager,
  normalizeSites,
  singleSite,
  type DeferredLocations,
  type SiteList,
} from './location-manager.js';
export { BlockManager, createBlockName } from './block-manager.js';
export { DiscoveryQueries } from './discovery.js';
