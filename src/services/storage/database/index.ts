/**
 * Database Module - Public API
 */

export { MigrationError } from '../migrations/index.js';

export type { LedgerDatabaseInfo, LedgerStats } from './types.js';

export { LedgerDatabase } from './service.js';

export { translateStoreError, validateName, getDatabasePath } from './helpers.js';
