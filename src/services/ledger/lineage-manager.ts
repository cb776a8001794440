/**
 * Lineage Manager
 *
 * Parent/child edges between files, keyed by LFN. An edge may name files
 * that are not tracked yet. Nothing is cached: every read goes to the store
 * through the caller's scope, so rolled-back edges are never reported.
 *
 * Edges that would make a file its own ancestor are rejected with a
 * ValidationError carrying LINEAGE_CYCLE.
 *
 * @module ledger/lineage-manager
 */

import type { UploadStatus } from '../../models/file-record.js';
import { LfnListSchema, LfnSchema, validateInput } from '../../utils/validation.js';
import type { QueryCatalog } from '../storage/query-catalog.js';
import { runInTransaction, type TransactionScope } from '../storage/transaction-scope.js';

function distinct(lfns: readonly string[]): string[] {
  return [...new Set(lfns)];
}

export class LineageManager {
  constructor(private readonly catalog: QueryCatalog) {}

  /**
   * Declare parents of a file. Idempotent per edge.
   */
  addParents(scope: TransactionScope, childLfn: string, parentLfns: readonly string[]): void {
    const child = validateInput(LfnSchema, childLfn);
    const parents = distinct(validateInput(LfnListSchema, parentLfns));
    if (parents.length === 0) return;

    runInTransaction(scope, () => {
      this.catalog.execute('AddParents', scope, child, parents);
    });
  }

  /**
   * Declare children of a file, i.e. add the file as a parent of each child
   */
  addChildren(scope: TransactionScope, parentLfn: string, childLfns: readonly string[]): void {
    const parent = validateInput(LfnSchema, parentLfn);
    const children = distinct(validateInput(LfnListSchema, childLfns));
    if (children.length === 0) return;

    const addParents = this.catalog.resolve('AddParents', scope);
    runInTransaction(scope, () => {
      for (const child of children) {
        addParents(child, [parent]);
      }
    });
  }

  /**
   * @returns number of edges removed
   */
  removeParents(scope: TransactionScope, childLfn: string, parentLfns: readonly string[]): number {
    const child = validateInput(LfnSchema, childLfn);
    const parents = distinct(validateInput(LfnListSchema, parentLfns));
    return runInTransaction(scope, () =>
      this.catalog.execute('DeleteParents', scope, child, parents)
    );
  }

  getParentLFNs(scope: TransactionScope, lfn: string): string[] {
    return this.catalog.execute('GetParents', scope, validateInput(LfnSchema, lfn));
  }

  getChildren(scope: TransactionScope, lfn: string): string[] {
    return this.catalog.execute('GetChildren', scope, validateInput(LfnSchema, lfn));
  }

  /**
   * Upload status of each parent, in parent LFN order; null for a parent
   * that is not tracked. Enforcing parent-before-child upload is left to
   * the caller.
   */
  getParentStatus(scope: TransactionScope, lfn: string): Array<UploadStatus | null> {
    return this.catalog.execute('GetParentStatus', scope, validateInput(LfnSchema, lfn));
  }
}
