/**
 * FileRecord - one tracked output file
 *
 * Holds identity, descriptors, algorithm, dataset path, runs, locations,
 * status and block of a file, and persists them through the query catalog.
 * Every operation that touches the store takes the caller's TransactionScope;
 * without an open transaction the operation commits on its own.
 *
 * In-memory state is per instance. Two instances for the same LFN never
 * share buffers.
 *
 * @module ledger/file-record
 */

import { DuplicateError, LedgerErrorCode, NotFoundError, ValidationError } from '../../errors.js';
import {
  INITIAL_UPLOAD_STATUS,
  type AlgorithmInfo,
  type ChecksumMap,
  type FileIdentity,
  type UploadStatus,
} from '../../models/file-record.js';
import { Run, mergeRuns } from '../../models/run.js';
import {
  AlgorithmSchema,
  ChecksumMapSchema,
  DatasetPathSchema,
  FileRecordInitSchema,
  RunSchema,
  UploadStatusSchema,
  validateInput,
} from '../../utils/validation.js';
import type { QueryCatalog } from '../storage/query-catalog.js';
import { runInTransaction, type TransactionScope } from '../storage/transaction-scope.js';
import { LineageManager } from './lineage-manager.js';
import {
  DeferredLocationHandle,
  LocationManager,
  PendingLocations,
  normalizeSites,
  type DeferredLocations,
  type SiteList,
} from './location-manager.js';

export interface FileRecordInit {
  id?: number;
  lfn?: string;
  size?: number;
  events?: number;
  checksums?: ChecksumMap;
  /** Buffered like a deferred setLocation; written by create() */
  locations?: SiteList;
}

export interface LoadOptions {
  /** Also load parent records, one level deep */
  parentage?: boolean;
}

export interface SetLocationOptions {
  /** Default true. false buffers the sites and returns a DeferredLocations handle. */
  immediateSave?: boolean;
}

export class FileRecord {
  private idValue: number | undefined;
  /** Id given at construction; the only id create() asks the store for */
  private readonly requestedId: number | undefined;
  private lfnValue: string | undefined;
  private sizeValue: number;
  private eventsValue: number;
  private readonly checksumMap = new Map<string, string>();
  private algorithmValue: AlgorithmInfo | null = null;
  private datasetPathValue: string | null = null;
  private readonly runMap = new Map<number, Run>();
  private readonly storedLocations = new Set<string>();
  private readonly pendingLocations = new PendingLocations();
  private statusValue: UploadStatus = INITIAL_UPLOAD_STATUS;
  private blockNameValue: string | null = null;
  private parentRecords: FileRecord[] = [];
  private readonly lineage: LineageManager;
  private readonly locationManager: LocationManager;

  constructor(
    private readonly catalog: QueryCatalog,
    init: FileRecordInit
  ) {
    const parsed = validateInput(FileRecordInitSchema, init);
    this.idValue = parsed.id;
    this.requestedId = parsed.id;
    this.lfnValue = parsed.lfn;
    this.sizeValue = parsed.size;
    this.eventsValue = parsed.events;
    for (const [type, digest] of Object.entries(parsed.checksums)) {
      this.checksumMap.set(type, digest);
    }
    if (init.locations !== undefined) {
      this.pendingLocations.add(normalizeSites(init.locations));
    }
    this.lineage = new LineageManager(catalog);
    this.locationManager = new LocationManager(catalog);
  }

  // ==================== ACCESSORS ====================

  get id(): number | undefined {
    return this.idValue;
  }

  get lfn(): string | undefined {
    return this.lfnValue;
  }

  get size(): number {
    return this.sizeValue;
  }

  get events(): number {
    return this.eventsValue;
  }

  get checksums(): ChecksumMap {
    return Object.fromEntries([...this.checksumMap].sort(([a], [b]) => a.localeCompare(b)));
  }

  get algorithm(): AlgorithmInfo | null {
    return this.algorithmValue === null ? null : { ...this.algorithmValue };
  }

  get datasetPath(): string | null {
    return this.datasetPathValue;
  }

  /** Runs ordered by run number */
  get runs(): Run[] {
    return [...this.runMap.values()].sort((a, b) => a.run - b.run).map((run) => run.clone());
  }

  /** Stored and pending sites, sorted */
  get locations(): string[] {
    return [...new Set([...this.storedLocations, ...this.pendingLocations.values()])].sort();
  }

  /** Sites buffered by deferred setLocation calls and not yet written */
  get unsavedLocations(): string[] {
    return this.pendingLocations.values();
  }

  get status(): UploadStatus {
    return this.statusValue;
  }

  get blockName(): string | null {
    return this.blockNameValue;
  }

  /** Parent records materialized by load({ parentage: true }) */
  get parents(): readonly FileRecord[] {
    return this.parentRecords;
  }

  // ==================== IN-MEMORY SETTERS ====================

  /**
   * Set the producing algorithm. Required before create().
   */
  setAlgorithm(algorithm: AlgorithmInfo): this {
    this.algorithmValue = validateInput(AlgorithmSchema, algorithm);
    return this;
  }

  /**
   * Set the dataset path. Required before create().
   */
  setDatasetPath(path: string): this {
    this.datasetPathValue = validateInput(DatasetPathSchema, path);
    return this;
  }

  addRun(run: Run): this {
    return this.addRunSet([run]);
  }

  /**
   * Union runs into this record; lumis of a repeated run are merged
   */
  addRunSet(runs: Iterable<Run>): this {
    const list = [...runs];
    for (const run of list) {
      validateInput(RunSchema, { run: run.run, lumis: run.lumis });
    }
    mergeRuns(this.runMap, list);
    return this;
  }

  addChecksum(type: string, digest: string): this {
    const parsed = validateInput(ChecksumMapSchema, { [type]: digest });
    for (const [key, value] of Object.entries(parsed)) {
      this.checksumMap.set(key, value);
    }
    return this;
  }

  // ==================== PERSISTENCE ====================

  /**
   * Insert this file with its checksums, runs and pending locations
   *
   * @returns the file id
   * @throws ValidationError if the LFN, algorithm or dataset path is missing
   * @throws DuplicateError if the LFN is already tracked
   */
  create(scope: TransactionScope): number {
    const lfn = this.requireLfn('create');
    const algorithm = this.algorithmValue;
    const datasetPath = this.datasetPathValue;
    if (algorithm === null) {
      throw new ValidationError(`Cannot create ${lfn}: algorithm is not set`);
    }
    if (datasetPath === null) {
      throw new ValidationError(`Cannot create ${lfn}: dataset path is not set`);
    }

    const sites = this.locations;
    const catalog = this.catalog;
    const owned = !scope.inTransaction;
    const id = runInTransaction(scope, () => {
      if (catalog.execute('FileExists', scope, { lfn }) !== null) {
        throw new DuplicateError(`File ${lfn} already exists`, LedgerErrorCode.DUPLICATE_FILE);
      }

      const datasetId = catalog.execute('AddDataset', scope, datasetPath);
      const algorithmId = catalog.execute('AddAlgorithm', scope, algorithm);
      const associationId = catalog.execute(
        'AssociateAlgorithmDataset',
        scope,
        algorithmId,
        datasetId
      );
      const fileId = catalog.execute('AddFile', scope, {
        id: this.requestedId,
        lfn,
        size: this.sizeValue,
        events: this.eventsValue,
        algorithm_dataset_id: associationId,
        status: INITIAL_UPLOAD_STATUS,
        created_at: new Date().toISOString(),
      });

      if (this.checksumMap.size > 0) {
        catalog.execute('AddChecksums', scope, fileId, Object.fromEntries(this.checksumMap));
      }
      if (this.runMap.size > 0) {
        catalog.execute('AddRuns', scope, fileId, [...this.runMap.values()]);
      }
      if (sites.length > 0) {
        catalog.execute('SetFileLocations', scope, fileId, sites);
      }
      return fileId;
    });

    this.idValue = id;
    this.statusValue = INITIAL_UPLOAD_STATUS;
    if (owned) {
      this.markLocationsStored(sites);
    }
    return id;
  }

  /**
   * Remove this file with its checksums, runs, locations and lineage edges
   * @throws NotFoundError if the file is not tracked
   */
  delete(scope: TransactionScope): void {
    runInTransaction(scope, () => {
      const id = this.requireStoredId(scope);
      this.catalog.execute('DeleteFile', scope, id);
    });
    this.storedLocations.clear();
  }

  /**
   * @returns the file id if tracked in the state the scope sees, otherwise false
   */
  exists(scope: TransactionScope): number | false {
    return this.catalog.execute('FileExists', scope, this.identity()) ?? false;
  }

  /**
   * Replace in-memory state with the stored file. Pending locations are kept.
   * @throws NotFoundError if the file is not tracked
   */
  load(scope: TransactionScope, options: LoadOptions = {}): this {
    runInTransaction(scope, () => {
      const stored = this.catalog.execute('GetFile', scope, this.identity());
      if (stored === null) {
        throw new NotFoundError(`File ${this.describe()} not found`);
      }

      this.idValue = stored.id;
      this.lfnValue = stored.lfn;
      this.sizeValue = stored.size;
      this.eventsValue = stored.events;
      this.statusValue = stored.status;
      this.algorithmValue = stored.algorithm;
      this.datasetPathValue = stored.dataset_path;
      this.blockNameValue = stored.block_name;

      this.checksumMap.clear();
      for (const [type, digest] of Object.entries(
        this.catalog.execute('GetChecksums', scope, stored.id)
      )) {
        this.checksumMap.set(type, digest);
      }

      this.runMap.clear();
      mergeRuns(this.runMap, this.catalog.execute('GetRuns', scope, stored.id));

      this.storedLocations.clear();
      for (const site of this.locationManager.getLocations(scope, stored.id)) {
        this.storedLocations.add(site);
      }

      this.parentRecords = options.parentage ? this.loadParents(scope, stored.lfn) : [];
    });
    return this;
  }

  /**
   * Write any pending locations and then store sites on this file
   * @throws NotFoundError if the file is not tracked
   */
  setLocation(scope: TransactionScope, sites: SiteList, options?: { immediateSave?: true }): void;
  /**
   * Buffer sites in this instance and return the handle that flushes or
   * discards them
   */
  setLocation(
    scope: TransactionScope,
    sites: SiteList,
    options: { immediateSave: false }
  ): DeferredLocations;
  setLocation(
    scope: TransactionScope,
    sites: SiteList,
    options: SetLocationOptions = {}
  ): DeferredLocations | void {
    if (options.immediateSave === false) {
      return this.deferLocation(sites);
    }
    this.pendingLocations.add(normalizeSites(sites));
    this.flushLocations(scope);
  }

  /**
   * Buffer sites without writing them
   */
  deferLocation(sites: SiteList): DeferredLocations {
    const names = normalizeSites(sites);
    this.pendingLocations.add(names);
    return new DeferredLocationHandle(
      names,
      (scope) => {
        this.flushLocations(scope);
      },
      (discarded) => {
        this.pendingLocations.remove(discarded);
      }
    );
  }

  /**
   * Write every pending location. Inside a caller's transaction the sites
   * stay pending, so a rollback loses nothing; the next flush in a
   * transaction of its own clears them.
   * @throws NotFoundError if the file is not tracked
   */
  flushLocations(scope: TransactionScope): void {
    const sites = this.pendingLocations.values();
    if (sites.length === 0) return;
    const owned = !scope.inTransaction;
    runInTransaction(scope, () => {
      this.locationManager.setLocations(scope, this.requireStoredId(scope), sites);
    });
    if (owned) {
      this.markLocationsStored(sites);
    }
  }

  /**
   * Persist runs added since create() or load()
   * @throws NotFoundError if the file is not tracked
   */
  saveRuns(scope: TransactionScope): void {
    const runs = [...this.runMap.values()];
    runInTransaction(scope, () => {
      const id = this.requireStoredId(scope);
      if (runs.length > 0) {
        this.catalog.execute('AddRuns', scope, id, runs);
      }
    });
  }

  /**
   * @throws NotFoundError if the file is not tracked
   */
  setStatus(scope: TransactionScope, status: UploadStatus): void {
    const newStatus = validateInput(UploadStatusSchema, status);
    runInTransaction(scope, () => {
      const id = this.requireStoredId(scope);
      this.catalog.execute('SetFileStatus', scope, id, newStatus);
    });
    this.statusValue = newStatus;
  }

  // ==================== LINEAGE ====================

  addParents(scope: TransactionScope, lfns: readonly string[]): void {
    this.lineage.addParents(scope, this.requireLfn('add parents to'), lfns);
  }

  addChildren(scope: TransactionScope, lfns: readonly string[]): void {
    this.lineage.addChildren(scope, this.requireLfn('add children to'), lfns);
  }

  /**
   * Parent LFNs as currently stored, tracked or not
   */
  getParentLFNs(scope: TransactionScope): string[] {
    if (this.lfnValue === undefined) {
      this.load(scope);
    }
    return this.lineage.getParentLFNs(scope, this.requireLfn('read parents of'));
  }

  // ==================== COMPARISON ====================

  /**
   * Field-wise equality over identity, descriptors, algorithm, dataset
   * path, runs and locations
   */
  equals(other: FileRecord): boolean {
    if (
      this.idValue !== other.idValue ||
      this.lfnValue !== other.lfnValue ||
      this.sizeValue !== other.sizeValue ||
      this.eventsValue !== other.eventsValue ||
      this.datasetPathValue !== other.datasetPathValue
    ) {
      return false;
    }
    if (!sameAlgorithm(this.algorithmValue, other.algorithmValue)) {
      return false;
    }
    if (!sameEntries([...this.checksumMap], [...other.checksumMap])) {
      return false;
    }
    if (!sameEntries(this.locations, other.locations)) {
      return false;
    }
    const runs = this.runs;
    const otherRuns = other.runs;
    return runs.length === otherRuns.length && runs.every((run, i) => run.equals(otherRuns[i]));
  }

  // ==================== INTERNALS ====================

  private identity(): FileIdentity {
    return { id: this.idValue, lfn: this.lfnValue };
  }

  private describe(): string {
    return this.lfnValue ?? `#${String(this.idValue)}`;
  }

  private requireLfn(action: string): string {
    if (this.lfnValue === undefined) {
      throw new ValidationError(`Cannot ${action} file #${String(this.idValue)}: LFN is not known`);
    }
    return this.lfnValue;
  }

  private requireStoredId(scope: TransactionScope): number {
    const id = this.catalog.execute('FileExists', scope, this.identity());
    if (id === null) {
      throw new NotFoundError(`File ${this.describe()} not found`);
    }
    this.idValue = id;
    return id;
  }

  private markLocationsStored(sites: readonly string[]): void {
    for (const site of sites) {
      this.storedLocations.add(site);
    }
    this.pendingLocations.remove(sites);
  }

  private loadParents(scope: TransactionScope, lfn: string): FileRecord[] {
    const parents: FileRecord[] = [];
    for (const parentLfn of this.lineage.getParentLFNs(scope, lfn)) {
      if (this.catalog.execute('FileExists', scope, { lfn: parentLfn }) === null) {
        continue;
      }
      parents.push(new FileRecord(this.catalog, { lfn: parentLfn }).load(scope));
    }
    return parents;
  }
}

function sameAlgorithm(a: AlgorithmInfo | null, b: AlgorithmInfo | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return (
    a.appName === b.appName &&
    a.appVer === b.appVer &&
    a.appFam === b.appFam &&
    a.psetHash === b.psetHash &&
    a.configContent === b.configContent
  );
}

function sameEntries<T>(a: readonly T[], b: readonly T[]): boolean {
  if (a.length !== b.length) return false;
  const key = (value: T): string => JSON.stringify(value);
  const left = a.map(key).sort();
  const right = b.map(key).sort();
  return left.every((value, i) => value === right[i]);
}
