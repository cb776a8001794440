/**
 * LedgerDatabase Lifecycle Tests
 *
 * Creation, opening, listing, deletion and existence checks.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { existsSync } from 'fs';
import { join } from 'path';
import {
  createTestDir,
  cleanupTestDir,
  createUniqueDatabaseName,
  insertTestFile,
  captureError,
  UploadLedger,
} from '../ledger/helpers.js';
import { LedgerDatabase } from '../../../src/services/storage/database/service.js';
import { LedgerErrorCode } from '../../../src/errors.js';

describe('LedgerDatabase - Lifecycle', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = createTestDir('ledger-lifecycle-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  describe('create()', () => {
    it('creates the database file and stamps its name', () => {
      const name = createUniqueDatabaseName('test-create');
      const database = LedgerDatabase.create(name, testDir);

      try {
        expect(existsSync(join(testDir, `${name}.db`))).toBe(true);
        expect(database.getPath()).toBe(join(testDir, `${name}.db`));
        expect(database.getName()).toBe(name);

        const row = database
          .getConnection()
          .prepare('SELECT database_name FROM ledger_metadata WHERE id = 1')
          .get() as { database_name: string };
        expect(row.database_name).toBe(name);
      } finally {
        database.close();
      }
    });

    it('creates the storage directory if needed', () => {
      const storage = join(testDir, `nested-${String(Date.now())}`);
      const database = LedgerDatabase.create('fresh', storage);
      database.close();

      expect(existsSync(join(storage, 'fresh.db'))).toBe(true);
    });

    it('throws DATABASE_ALREADY_EXISTS for a taken name', () => {
      const name = createUniqueDatabaseName('test-taken');
      LedgerDatabase.create(name, testDir).close();

      const error = captureError(() => LedgerDatabase.create(name, testDir));
      expect(error).toMatchObject({ code: LedgerErrorCode.DATABASE_ALREADY_EXISTS });
    });

    it('throws INVALID_NAME for a name with path characters', () => {
      const error = captureError(() => LedgerDatabase.create('../escape', testDir));
      expect(error).toMatchObject({ code: LedgerErrorCode.INVALID_NAME });
    });
  });

  describe('open()', () => {
    it('sees data written before close', () => {
      const name = createUniqueDatabaseName('test-reopen');
      const first = UploadLedger.create(name, testDir);
      const id = insertTestFile(first, first.createScope(), '/store/a.root').id;
      first.close();

      const second = UploadLedger.open(name, testDir);
      try {
        expect(second.file({ lfn: '/store/a.root' }).exists(second.createScope())).toBe(id);
      } finally {
        second.close();
      }
    });

    it('throws DATABASE_NOT_FOUND for an unknown name', () => {
      const error = captureError(() => LedgerDatabase.open('missing', testDir));
      expect(error).toMatchObject({ code: LedgerErrorCode.DATABASE_NOT_FOUND });
    });
  });

  describe('list()', () => {
    it('reports every ledger with its file count', () => {
      const storage = createTestDir('ledger-list-');
      try {
        const ledger = UploadLedger.create('alpha', storage);
        insertTestFile(ledger, ledger.createScope(), '/store/a.root');
        ledger.close();
        LedgerDatabase.create('beta', storage).close();

        const listed = LedgerDatabase.list(storage)
          .map((info) => ({ name: info.name, total_files: info.total_files }))
          .sort((a, b) => a.name.localeCompare(b.name));
        expect(listed).toEqual([
          { name: 'alpha', total_files: 1 },
          { name: 'beta', total_files: 0 },
        ]);
      } finally {
        cleanupTestDir(storage);
      }
    });

    it('returns an empty list for a missing directory', () => {
      expect(LedgerDatabase.list(join(testDir, 'nowhere'))).toEqual([]);
    });
  });

  describe('delete() and exists()', () => {
    it('removes the database', () => {
      const name = createUniqueDatabaseName('test-delete');
      LedgerDatabase.create(name, testDir).close();
      expect(LedgerDatabase.exists(name, testDir)).toBe(true);

      LedgerDatabase.delete(name, testDir);

      expect(LedgerDatabase.exists(name, testDir)).toBe(false);
      expect(existsSync(join(testDir, `${name}.db-wal`))).toBe(false);
    });

    it('delete() throws DATABASE_NOT_FOUND for an unknown name', () => {
      const error = captureError(() => LedgerDatabase.delete('missing', testDir));
      expect(error).toMatchObject({ code: LedgerErrorCode.DATABASE_NOT_FOUND });
    });

    it('exists() is false for an invalid name', () => {
      expect(LedgerDatabase.exists('bad name', testDir)).toBe(false);
    });
  });
});
