/**
 * SQL Schema Definitions for the Upload Ledger
 *
 * Contains all table creation SQL, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Per-connection pragmas. busy_timeout is appended from configuration.
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -16000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Ledger metadata table - database name and modification time
 */
export const CREATE_LEDGER_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS ledger_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  database_version TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

/**
 * Datasets - one row per dataset path
 */
export const CREATE_DATASETS_TABLE = `
CREATE TABLE IF NOT EXISTS datasets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  path TEXT NOT NULL UNIQUE,
  created_at TEXT NOT NULL
)
`;

/**
 * Algorithms - shared by every file produced with the same
 * (app_name, app_ver, app_fam, pset_hash) tuple
 */
export const CREATE_ALGORITHMS_TABLE = `
CREATE TABLE IF NOT EXISTS algorithms (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  app_name TEXT NOT NULL,
  app_ver TEXT NOT NULL,
  app_fam TEXT NOT NULL,
  pset_hash TEXT NOT NULL,
  config_content TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL,
  UNIQUE (app_name, app_ver, app_fam, pset_hash)
)
`;

/**
 * Algorithm/dataset association - files point at one of these
 */
export const CREATE_ALGORITHM_DATASETS_TABLE = `
CREATE TABLE IF NOT EXISTS algorithm_datasets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  algorithm_id INTEGER NOT NULL,
  dataset_id INTEGER NOT NULL,
  UNIQUE (algorithm_id, dataset_id),
  FOREIGN KEY (algorithm_id) REFERENCES algorithms(id),
  FOREIGN KEY (dataset_id) REFERENCES datasets(id)
)
`;

/**
 * Blocks - named upload units
 */
export const CREATE_BLOCKS_TABLE = `
CREATE TABLE IF NOT EXISTS blocks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  status TEXT NOT NULL DEFAULT 'OPEN' CHECK (status IN ('OPEN', 'CLOSED', 'UPLOADED')),
  created_at TEXT NOT NULL
)
`;

/**
 * Files - one row per tracked LFN
 */
export const CREATE_FILES_TABLE = `
CREATE TABLE IF NOT EXISTS files (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  lfn TEXT NOT NULL UNIQUE,
  size INTEGER NOT NULL DEFAULT 0 CHECK (size >= 0),
  events INTEGER NOT NULL DEFAULT 0 CHECK (events >= 0),
  algorithm_dataset_id INTEGER NOT NULL,
  block_id INTEGER,
  status TEXT NOT NULL DEFAULT 'NOTUPLOADED' CHECK (status IN ('NOTUPLOADED', 'PENDING', 'UPLOADED')),
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL,
  FOREIGN KEY (algorithm_dataset_id) REFERENCES algorithm_datasets(id),
  FOREIGN KEY (block_id) REFERENCES blocks(id)
)
`;

export const CREATE_FILE_CHECKSUMS_TABLE = `
CREATE TABLE IF NOT EXISTS file_checksums (
  file_id INTEGER NOT NULL,
  type TEXT NOT NULL,
  digest TEXT NOT NULL,
  PRIMARY KEY (file_id, type),
  FOREIGN KEY (file_id) REFERENCES files(id)
)
`;

/**
 * Runs and their lumi sections. A run may be recorded with no lumis,
 * so runs get their own table.
 */
export const CREATE_FILE_RUNS_TABLE = `
CREATE TABLE IF NOT EXISTS file_runs (
  file_id INTEGER NOT NULL,
  run INTEGER NOT NULL CHECK (run >= 0),
  PRIMARY KEY (file_id, run),
  FOREIGN KEY (file_id) REFERENCES files(id)
)
`;

export const CREATE_FILE_RUN_LUMIS_TABLE = `
CREATE TABLE IF NOT EXISTS file_run_lumis (
  file_id INTEGER NOT NULL,
  run INTEGER NOT NULL,
  lumi INTEGER NOT NULL CHECK (lumi >= 0),
  PRIMARY KEY (file_id, run, lumi),
  FOREIGN KEY (file_id, run) REFERENCES file_runs(file_id, run)
)
`;

/**
 * Known storage sites
 */
export const CREATE_LOCATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS locations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  site_name TEXT NOT NULL UNIQUE
)
`;

export const CREATE_FILE_LOCATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS file_locations (
  file_id INTEGER NOT NULL,
  location_id INTEGER NOT NULL,
  PRIMARY KEY (file_id, location_id),
  FOREIGN KEY (file_id) REFERENCES files(id),
  FOREIGN KEY (location_id) REFERENCES locations(id)
)
`;

export const CREATE_BLOCK_LOCATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS block_locations (
  block_id INTEGER NOT NULL,
  location_id INTEGER NOT NULL,
  PRIMARY KEY (block_id, location_id),
  FOREIGN KEY (block_id) REFERENCES blocks(id),
  FOREIGN KEY (location_id) REFERENCES locations(id)
)
`;

/**
 * Lineage edges keyed by LFN. Either end may name a file that is not
 * (yet) tracked; creating that file later attaches it to the edge.
 */
export const CREATE_FILE_PARENTS_TABLE = `
CREATE TABLE IF NOT EXISTS file_parents (
  child_lfn TEXT NOT NULL,
  parent_lfn TEXT NOT NULL,
  created_at TEXT NOT NULL,
  PRIMARY KEY (child_lfn, parent_lfn),
  CHECK (child_lfn != parent_lfn)
)
`;

/**
 * Tables in dependency order
 */
export const TABLE_DEFINITIONS: ReadonlyArray<{ name: string; sql: string }> = [
  { name: 'ledger_metadata', sql: CREATE_LEDGER_METADATA_TABLE },
  { name: 'datasets', sql: CREATE_DATASETS_TABLE },
  { name: 'algorithms', sql: CREATE_ALGORITHMS_TABLE },
  { name: 'algorithm_datasets', sql: CREATE_ALGORITHM_DATASETS_TABLE },
  { name: 'blocks', sql: CREATE_BLOCKS_TABLE },
  { name: 'files', sql: CREATE_FILES_TABLE },
  { name: 'file_checksums', sql: CREATE_FILE_CHECKSUMS_TABLE },
  { name: 'file_runs', sql: CREATE_FILE_RUNS_TABLE },
  { name: 'file_run_lumis', sql: CREATE_FILE_RUN_LUMIS_TABLE },
  { name: 'locations', sql: CREATE_LOCATIONS_TABLE },
  { name: 'file_locations', sql: CREATE_FILE_LOCATIONS_TABLE },
  { name: 'block_locations', sql: CREATE_BLOCK_LOCATIONS_TABLE },
  { name: 'file_parents', sql: CREATE_FILE_PARENTS_TABLE },
];

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_files_status ON files(status)',
  'CREATE INDEX IF NOT EXISTS idx_files_block_id ON files(block_id)',
  'CREATE INDEX IF NOT EXISTS idx_files_algorithm_dataset_id ON files(algorithm_dataset_id)',
  'CREATE INDEX IF NOT EXISTS idx_algorithm_datasets_dataset_id ON algorithm_datasets(dataset_id)',
  'CREATE INDEX IF NOT EXISTS idx_file_locations_location_id ON file_locations(location_id)',
  'CREATE INDEX IF NOT EXISTS idx_file_parents_parent_lfn ON file_parents(parent_lfn)',
] as const;

export const REQUIRED_TABLES = ['schema_version', ...TABLE_DEFINITIONS.map((t) => t.name)];

export const REQUIRED_INDEXES = [
  'idx_files_status',
  'idx_files_block_id',
  'idx_files_algorithm_dataset_id',
  'idx_algorithm_datasets_dataset_id',
  'idx_file_locations_location_id',
  'idx_file_parents_parent_lfn',
] as const;
