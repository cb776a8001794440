/**
 * Upload Ledger
 *
 * Transactional metadata ledger for files produced by batch jobs, tracked
 * until they are registered in an external dataset catalog.
 *
 * Logging goes to stderr through console.error; the library never writes to stdout.
 *
 * @module index
 */

export * from './errors.js';
export * from './models/index.js';
export * from './services/ledger/index.js';
export * from './services/storage/index.js';
export {
  loadLedgerConfig,
  LedgerConfigSchema,
  LEDGER_DIALECTS,
  type LedgerConfig,
  type LedgerDialect,
} from './utils/config.js';
