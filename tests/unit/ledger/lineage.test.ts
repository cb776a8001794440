/**
 * Lineage Tests
 *
 * Parent/child edges by LFN, late-created parents, parent status and cycles.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import {
  createTestDir,
  cleanupTestDir,
  createFreshLedger,
  safeCloseLedger,
  insertTestFile,
  captureError,
  UploadLedger,
} from './helpers.js';
import { LedgerErrorCode, ValidationError } from '../../../src/errors.js';
import type { TransactionScope } from '../../../src/services/storage/transaction-scope.js';

const A = '/store/A.root';
const B = '/store/B.root';
const C = '/store/C.root';
const X = '/store/X.root';

describe('Lineage', () => {
  let testDir: string;
  let ledger: UploadLedger;
  let scope: TransactionScope;

  beforeAll(() => {
    testDir = createTestDir('ledger-lineage-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    ledger = createFreshLedger(testDir, 'test-lineage');
    scope = ledger.createScope();
  });

  afterEach(() => {
    safeCloseLedger(ledger);
  });

  describe('parents declared before they exist', () => {
    it('resolve to parent records once the parents are created', () => {
      const child = insertTestFile(ledger, scope, X);
      child.addParents(scope, [A, B, C]);
      expect(child.getParentLFNs(scope)).toEqual([A, B, C]);

      insertTestFile(ledger, scope, A);
      insertTestFile(ledger, scope, B);
      insertTestFile(ledger, scope, C);

      const loaded = ledger.file({ lfn: X }).load(scope, { parentage: true });
      expect(loaded.parents.map((p) => p.lfn)).toEqual([A, B, C]);
      expect(loaded.parents.every((p) => p.size === 1024)).toBe(true);
    });

    it('report only created parents as records', () => {
      const child = insertTestFile(ledger, scope, X);
      child.addParents(scope, [A, B]);
      insertTestFile(ledger, scope, B);

      const loaded = ledger.file({ lfn: X }).load(scope, { parentage: true });
      expect(loaded.parents.map((p) => p.lfn)).toEqual([B]);
      expect(loaded.getParentLFNs(scope)).toEqual([A, B]);
    });

    it('attach to a child created after addChildren()', () => {
      const parent = insertTestFile(ledger, scope, A);
      parent.addChildren(scope, [X]);

      insertTestFile(ledger, scope, X);
      expect(ledger.lineage.getParentStatus(scope, X)).toEqual(['NOTUPLOADED']);
    });
  });

  it('does not load parents of parents', () => {
    insertTestFile(ledger, scope, A).addChildren(scope, [B]);
    insertTestFile(ledger, scope, B).addChildren(scope, [X]);
    insertTestFile(ledger, scope, X);

    const loaded = ledger.file({ lfn: X }).load(scope, { parentage: true });
    expect(loaded.parents).toHaveLength(1);
    expect(loaded.parents[0].lfn).toBe(B);
    expect(loaded.parents[0].parents).toEqual([]);
  });

  it('load() without parentage leaves parents empty', () => {
    insertTestFile(ledger, scope, A);
    insertTestFile(ledger, scope, X).addParents(scope, [A]);

    expect(ledger.file({ lfn: X }).load(scope).parents).toEqual([]);
  });

  it('adding an edge twice keeps one edge', () => {
    const child = insertTestFile(ledger, scope, X);
    child.addParents(scope, [A]);
    child.addParents(scope, [A, A]);

    expect(child.getParentLFNs(scope)).toEqual([A]);
    expect(ledger.database.getStats().total_parent_edges).toBe(1);
  });

  it('getChildren() lists every file naming the LFN as a parent', () => {
    ledger.lineage.addParents(scope, X, [A]);
    ledger.lineage.addParents(scope, C, [A]);
    ledger.lineage.addParents(scope, B, [C]);

    expect(ledger.lineage.getChildren(scope, A)).toEqual([C, X]);
    expect(ledger.lineage.getChildren(scope, B)).toEqual([]);
  });

  describe('getParentStatus()', () => {
    it('reports NOTUPLOADED for a parent never updated', () => {
      insertTestFile(ledger, scope, A);
      insertTestFile(ledger, scope, X).addParents(scope, [A]);

      expect(ledger.lineage.getParentStatus(scope, X)).toEqual(['NOTUPLOADED']);
    });

    it('follows status changes and reports null for an untracked parent', () => {
      const parent = insertTestFile(ledger, scope, A);
      insertTestFile(ledger, scope, X).addParents(scope, [A, B]);
      parent.setStatus(scope, 'UPLOADED');

      expect(ledger.lineage.getParentStatus(scope, X)).toEqual(['UPLOADED', null]);
    });

    it('returns one entry per parent in parent LFN order', () => {
      insertTestFile(ledger, scope, B).setStatus(scope, 'PENDING');
      insertTestFile(ledger, scope, X).addParents(scope, [C, B, A]);

      const statuses = ledger.lineage.getParentStatus(scope, X);
      expect(statuses).toHaveLength(ledger.lineage.getParentLFNs(scope, X).length);
      expect(statuses).toEqual([null, 'PENDING', null]);
    });
  });

  describe('removeParents()', () => {
    it('removes only the named edges', () => {
      ledger.lineage.addParents(scope, X, [A, B]);

      expect(ledger.lineage.removeParents(scope, X, [A, C])).toBe(1);
      expect(ledger.lineage.getParentLFNs(scope, X)).toEqual([B]);
    });
  });

  it('delete() removes edges in both directions', () => {
    insertTestFile(ledger, scope, A);
    const middle = insertTestFile(ledger, scope, B);
    insertTestFile(ledger, scope, X);
    ledger.lineage.addParents(scope, B, [A]);
    ledger.lineage.addParents(scope, X, [B]);

    middle.delete(scope);

    expect(ledger.lineage.getChildren(scope, A)).toEqual([]);
    expect(ledger.lineage.getParentLFNs(scope, X)).toEqual([]);
  });

  describe('cycles', () => {
    it('rejects a file as its own parent', () => {
      const error = captureError(() => ledger.lineage.addParents(scope, A, [A]));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: LedgerErrorCode.LINEAGE_CYCLE });
    });

    it('rejects an edge that closes a loop', () => {
      ledger.lineage.addParents(scope, A, [B]);
      ledger.lineage.addParents(scope, B, [C]);

      const error = captureError(() => ledger.lineage.addParents(scope, C, [A]));
      expect(error).toMatchObject({ code: LedgerErrorCode.LINEAGE_CYCLE });
      expect(ledger.lineage.getParentLFNs(scope, C)).toEqual([]);
    });

    it('rejects a loop closed through addChildren()', () => {
      ledger.lineage.addParents(scope, B, [A]);

      expect(() => ledger.lineage.addChildren(scope, B, [A])).toThrow(
        `Lineage edge ${A} -> ${B} would make "${A}" its own ancestor`
      );
    });

    it('allows diamonds', () => {
      ledger.lineage.addParents(scope, B, [A]);
      ledger.lineage.addParents(scope, C, [A]);
      ledger.lineage.addParents(scope, X, [B, C]);

      expect(ledger.lineage.getParentLFNs(scope, X)).toEqual([B, C]);
    });
  });

  it('rejects LFNs with whitespace', () => {
    expect(() => ledger.lineage.addParents(scope, X, ['/store/bad name.root'])).toThrow(
      'LFN must not contain whitespace'
    );
  });
});
