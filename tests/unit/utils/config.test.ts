/**
 * Ledger Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_DATABASES_PATH,
  loadLedgerConfig,
} from '../../../src/utils/config.js';
import { ValidationError } from '../../../src/errors.js';

const ENV_KEYS = [
  'UPLOAD_LEDGER_DATABASES_PATH',
  'UPLOAD_LEDGER_BUSY_TIMEOUT_MS',
  'UPLOAD_LEDGER_DIALECT',
  'UPLOAD_LEDGER_MAX_FILES',
] as const;

describe('loadLedgerConfig()', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('applies defaults', () => {
    expect(loadLedgerConfig()).toEqual({
      databasesPath: DEFAULT_DATABASES_PATH,
      busyTimeoutMs: 30000,
      dialect: 'sqlite',
      maxUploadableFiles: 10,
    });
  });

  it('reads the environment', () => {
    process.env.UPLOAD_LEDGER_DATABASES_PATH = '/tmp/ledgers';
    process.env.UPLOAD_LEDGER_BUSY_TIMEOUT_MS = '500';
    process.env.UPLOAD_LEDGER_MAX_FILES = '25';

    expect(loadLedgerConfig()).toEqual({
      databasesPath: '/tmp/ledgers',
      busyTimeoutMs: 500,
      dialect: 'sqlite',
      maxUploadableFiles: 25,
    });
  });

  it('lets overrides win over the environment', () => {
    process.env.UPLOAD_LEDGER_DATABASES_PATH = '/tmp/ledgers';
    expect(loadLedgerConfig({ databasesPath: '/srv/ledgers' }).databasesPath).toBe('/srv/ledgers');
  });

  it('rejects a non-numeric timeout', () => {
    process.env.UPLOAD_LEDGER_BUSY_TIMEOUT_MS = 'soon';
    expect(() => loadLedgerConfig()).toThrow(
      'Invalid numeric env var UPLOAD_LEDGER_BUSY_TIMEOUT_MS: "soon"'
    );
  });

  it('rejects an unknown dialect', () => {
    process.env.UPLOAD_LEDGER_DIALECT = 'oracle';
    expect(() => loadLedgerConfig()).toThrow(ValidationError);
  });

  it('rejects a zero batch size', () => {
    process.env.UPLOAD_LEDGER_MAX_FILES = '0';
    expect(() => loadLedgerConfig()).toThrow(/^Invalid ledger configuration: maxUploadableFiles:/);
  });
});
