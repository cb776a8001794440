/**
 * Location Manager
 *
 * Replica-set mutation for tracked files. Sites are opaque strings compared
 * by equality. A file's location set only grows.
 *
 * Two persistence modes exist at the FileRecord level: immediate, which
 * writes through this manager, and deferred, which buffers sites in the
 * record and hands the caller a DeferredLocations handle to flush or discard.
 *
 * @module ledger/location-manager
 */

import { NotFoundError } from '../../errors.js';
import { SiteListSchema, validateInput } from '../../utils/validation.js';
import type { QueryCatalog } from '../storage/query-catalog.js';
import { runInTransaction, type TransactionScope } from '../storage/transaction-scope.js';

/**
 * One or more site names. Use singleSite() for a single name.
 */
export type SiteList = ReadonlySet<string> | readonly string[];

export function singleSite(name: string): SiteList {
  return [name];
}

/**
 * Validate a site list and return its distinct names in sorted order
 */
export function normalizeSites(sites: SiteList): string[] {
  const names = validateInput(SiteListSchema, [...sites]);
  return [...new Set(names)].sort();
}

/**
 * Sites buffered in one FileRecord instance, not yet written
 */
export class PendingLocations {
  private readonly sites = new Set<string>();

  add(sites: readonly string[]): void {
    for (const site of sites) {
      this.sites.add(site);
    }
  }

  remove(sites: Iterable<string>): void {
    for (const site of sites) {
      this.sites.delete(site);
    }
  }

  values(): string[] {
    return [...this.sites].sort();
  }
}

/**
 * Handle for a deferred location addition. The buffered sites are written by
 * flush(), by the owning record's next immediate setLocation() or create(),
 * and are dropped by discard(). Anything else leaves them in memory only.
 */
export interface DeferredLocations {
  readonly sites: readonly string[];
  /** true once flush() or discard() has been called */
  readonly settled: boolean;
  flush(scope: TransactionScope): void;
  discard(): void;
}

export class DeferredLocationHandle implements DeferredLocations {
  private done = false;

  constructor(
    readonly sites: readonly string[],
    private readonly onFlush: (scope: TransactionScope) => void,
    private readonly onDiscard: (sites: readonly string[]) => void
  ) {}

  get settled(): boolean {
    return this.done;
  }

  /**
   * Write the owning record's whole pending buffer. No-op once settled.
   */
  flush(scope: TransactionScope): void {
    if (this.done) return;
    this.onFlush(scope);
    this.done = true;
  }

  /**
   * Drop this handle's sites from the pending buffer. Sites already
   * written by an earlier flush stay written.
   */
  discard(): void {
    if (this.done) return;
    this.onDiscard(this.sites);
    this.done = true;
  }
}

export class LocationManager {
  constructor(private readonly catalog: QueryCatalog) {}

  /**
   * Add sites to a stored file's replica set
   * @throws NotFoundError if the file does not exist
   */
  setLocations(scope: TransactionScope, fileId: number, sites: SiteList): void {
    const names = normalizeSites(sites);
    runInTransaction(scope, () => {
      if (this.catalog.execute('FileExists', scope, { id: fileId }) === null) {
        throw new NotFoundError(`File ${String(fileId)} not found`);
      }
      this.catalog.execute('SetFileLocations', scope, fileId, names);
    });
  }

  getLocations(scope: TransactionScope, fileId: number): string[] {
    return this.catalog.execute('GetFileLocations', scope, fileId);
  }

  /**
   * Register sites without attaching them to a file
   */
  addSites(scope: TransactionScope, sites: SiteList): void {
    const names = normalizeSites(sites);
    const addLocation = this.catalog.resolve('AddLocation', scope);
    runInTransaction(scope, () => {
      for (const name of names) {
        addLocation(name);
      }
    });
  }

  listSites(scope: TransactionScope): string[] {
    return this.catalog.execute('ListLocations', scope);
  }
}
