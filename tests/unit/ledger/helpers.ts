/**
 * Shared test helpers for ledger tests
 *
 * Temp directories, fresh ledger databases and file factories.
 */

import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { UploadLedger } from '../../../src/services/ledger/ledger.js';
import type { FileRecord, FileRecordInit } from '../../../src/services/ledger/file-record.js';
import type { AlgorithmInfo } from '../../../src/models/file-record.js';
import type { TransactionScope } from '../../../src/services/storage/transaction-scope.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export const TEST_ALGORITHM: AlgorithmInfo = {
  appName: 'X',
  appVer: '1.0',
  appFam: 'RECO',
  psetHash: 'H',
  configContent: 'C',
};

export const TEST_DATASET = '/A/B/RECO';

export function createTestAlgorithm(overrides: Partial<AlgorithmInfo> = {}): AlgorithmInfo {
  return { ...TEST_ALGORITHM, ...overrides };
}

/**
 * In-memory record with algorithm and dataset path set, ready for create()
 */
export function createTestFile(
  ledger: UploadLedger,
  init: FileRecordInit,
  datasetPath: string = TEST_DATASET
): FileRecord {
  return ledger.file(init).setAlgorithm(TEST_ALGORITHM).setDatasetPath(datasetPath);
}

/**
 * Create and persist a file in its own transaction
 */
export function insertTestFile(
  ledger: UploadLedger,
  scope: TransactionScope,
  lfn: string,
  datasetPath: string = TEST_DATASET
): FileRecord {
  const file = createTestFile(ledger, { lfn, size: 1024, events: 100 }, datasetPath);
  file.create(scope);
  return file;
}

/**
 * Run fn and return what it throws
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a temporary directory for ledger tests
 */
export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTestDir(testDir: string): void {
  try {
    rmSync(testDir, { recursive: true, force: true });
  } catch (error) {
    console.error(`[test-helpers] Failed to remove ${testDir}:`, error);
  }
}

/**
 * Create a unique database name
 */
export function createUniqueDatabaseName(prefix: string): string {
  return `${prefix}-${String(Date.now())}-${Math.random().toString(36).slice(2)}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST CONTEXT HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a fresh ledger database for a test
 */
export function createFreshLedger(testDir: string, prefix: string): UploadLedger {
  return UploadLedger.create(createUniqueDatabaseName(prefix), testDir);
}

/**
 * Close a ledger, rolling back anything a failed test left open
 */
export function safeCloseLedger(ledger: UploadLedger | undefined): void {
  if (!ledger) return;
  const connection = ledger.database.getConnection();
  if (connection.open && connection.inTransaction) {
    connection.exec('ROLLBACK');
  }
  if (connection.open) {
    ledger.close();
  }
}

export { UploadLedger };
