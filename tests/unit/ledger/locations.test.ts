/**
 * Location Tests
 *
 * Immediate and deferred setLocation, handle flush/discard and site registry.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import {
  createTestDir,
  cleanupTestDir,
  createFreshLedger,
  safeCloseLedger,
  createTestFile,
  insertTestFile,
  UploadLedger,
} from './helpers.js';
import { NotFoundError, ValidationError } from '../../../src/errors.js';
import { singleSite } from '../../../src/services/ledger/location-manager.js';
import type { TransactionScope } from '../../../src/services/storage/transaction-scope.js';

const LFN = '/store/a.root';

describe('Locations', () => {
  let testDir: string;
  let ledger: UploadLedger;
  let scope: TransactionScope;

  const storedLocations = (lfn: string = LFN): string[] =>
    ledger.file({ lfn }).load(scope).locations;

  beforeAll(() => {
    testDir = createTestDir('ledger-locations-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    ledger = createFreshLedger(testDir, 'test-locations');
    scope = ledger.createScope();
  });

  afterEach(() => {
    safeCloseLedger(ledger);
  });

  describe('immediate setLocation()', () => {
    it('writes the site right away', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.setLocation(scope, singleSite('se1'));

      expect(storedLocations()).toEqual(['se1']);
      expect(file.unsavedLocations).toEqual([]);
    });

    it('adding the same site twice keeps one entry', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.setLocation(scope, ['se1']);
      file.setLocation(scope, ['se1']);

      expect(storedLocations()).toEqual(['se1']);
      expect(ledger.database.getStats().total_locations).toBe(1);
    });

    it('accepts a Set and stores sites in sorted order', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.setLocation(scope, new Set(['se2', 'se1']));

      expect(storedLocations()).toEqual(['se1', 'se2']);
    });

    it('rejects an empty site name', () => {
      const file = insertTestFile(ledger, scope, LFN);
      expect(() => file.setLocation(scope, [''])).toThrow(ValidationError);
      expect(() => file.setLocation(scope, [''])).toThrow('Site name must not be empty');
    });

    it('fails with NotFoundError before create() and keeps the sites for create()', () => {
      const file = createTestFile(ledger, { lfn: LFN });

      expect(() => file.setLocation(scope, ['se1'])).toThrow(NotFoundError);
      expect(file.unsavedLocations).toEqual(['se1']);

      file.create(scope);
      expect(storedLocations()).toEqual(['se1']);
      expect(file.unsavedLocations).toEqual([]);
    });
  });

  describe('deferred setLocation()', () => {
    it('buffers sites without writing them', () => {
      const file = insertTestFile(ledger, scope, LFN);
      const handle = file.setLocation(scope, ['se9'], { immediateSave: false });

      expect(handle.sites).toEqual(['se9']);
      expect(handle.settled).toBe(false);
      expect(file.locations).toEqual(['se9']);
      expect(file.unsavedLocations).toEqual(['se9']);
      expect(storedLocations()).toEqual([]);
    });

    it('a later immediate call writes the union', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.setLocation(scope, ['se1'], { immediateSave: false });
      file.setLocation(scope, ['se2']);

      expect(storedLocations()).toEqual(['se1', 'se2']);
      expect(file.unsavedLocations).toEqual([]);
    });

    it('flush() writes the buffer and settles the handle', () => {
      const file = insertTestFile(ledger, scope, LFN);
      const handle = file.deferLocation(['se1', 'se2']);

      handle.flush(scope);

      expect(handle.settled).toBe(true);
      expect(storedLocations()).toEqual(['se1', 'se2']);
      expect(file.unsavedLocations).toEqual([]);
    });

    it('discard() drops only the handle sites', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.deferLocation(['se1']);
      const handle = file.deferLocation(['se2']);

      handle.discard();

      expect(handle.settled).toBe(true);
      expect(file.unsavedLocations).toEqual(['se1']);
      expect(file.locations).toEqual(['se1']);
    });

    it('flush() after discard() writes nothing', () => {
      const file = insertTestFile(ledger, scope, LFN);
      const handle = file.deferLocation(['se1']);
      handle.discard();
      handle.flush(scope);

      expect(storedLocations()).toEqual([]);
    });

    it('sites deferred before create() are written by create()', () => {
      const file = createTestFile(ledger, { lfn: LFN });
      file.deferLocation(['se3']);
      file.create(scope);

      expect(storedLocations()).toEqual(['se3']);
    });

    it('constructor locations are written by create()', () => {
      createTestFile(ledger, { lfn: LFN, locations: ['se2', 'se1'] }).create(scope);

      expect(storedLocations()).toEqual(['se1', 'se2']);
    });

    it('a flush inside a rolled-back transaction keeps every site pending', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.deferLocation(['se3']);

      scope.begin();
      file.setLocation(scope, ['se2']);
      expect(file.unsavedLocations).toEqual(['se2', 'se3']);
      scope.rollback();

      expect(storedLocations()).toEqual([]);
      expect(file.locations).toEqual(['se2', 'se3']);

      file.setLocation(scope, ['se2']);
      expect(storedLocations()).toEqual(['se2', 'se3']);
      expect(file.unsavedLocations).toEqual([]);
    });

    it('create() inside a rolled-back transaction keeps its sites for the retry', () => {
      const file = createTestFile(ledger, { lfn: LFN, locations: ['se1'] });

      scope.begin();
      file.create(scope);
      scope.rollback();
      expect(file.unsavedLocations).toEqual(['se1']);

      file.create(scope);
      expect(storedLocations()).toEqual(['se1']);
      expect(file.unsavedLocations).toEqual([]);
    });

    it('buffers are per instance', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.deferLocation(['se1']);

      const other = ledger.file({ lfn: LFN }).load(scope);
      expect(other.unsavedLocations).toEqual([]);
      expect(other.locations).toEqual([]);
    });

    it('load() keeps pending sites', () => {
      const file = insertTestFile(ledger, scope, LFN);
      file.setLocation(scope, ['se1']);
      file.deferLocation(['se2']);

      file.load(scope);

      expect(file.locations).toEqual(['se1', 'se2']);
      expect(file.unsavedLocations).toEqual(['se2']);
    });
  });

  describe('LocationManager', () => {
    it('registers sites without a file', () => {
      ledger.locations.addSites(scope, ['T2_B', 'T1_A', 'T2_B']);

      expect(ledger.locations.listSites(scope)).toEqual(['T1_A', 'T2_B']);
    });

    it('setLocations() fails with NotFoundError for an unknown file id', () => {
      expect(() => ledger.locations.setLocations(scope, 999, ['se1'])).toThrow(
        'File 999 not found'
      );
    });

    it('lists sites attached through files', () => {
      insertTestFile(ledger, scope, LFN).setLocation(scope, ['se1']);
      insertTestFile(ledger, scope, '/store/b.root').setLocation(scope, ['se0', 'se1']);

      expect(ledger.locations.listSites(scope)).toEqual(['se0', 'se1']);
    });
  });
});
