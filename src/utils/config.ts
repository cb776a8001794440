/**
 * Ledger Configuration
 *
 * Loaded from environment variables (optionally from a .env file) and
 * validated with zod. Explicit overrides win over the environment.
 *
 * Environment variables:
 *   UPLOAD_LEDGER_ENV_FILE         - explicit .env path
 *   UPLOAD_LEDGER_DATABASES_PATH   - directory holding ledger databases
 *   UPLOAD_LEDGER_BUSY_TIMEOUT_MS  - SQLite busy timeout (default: 30000)
 *   UPLOAD_LEDGER_DIALECT          - query dialect (default: sqlite)
 *   UPLOAD_LEDGER_MAX_FILES        - discovery batch size (default: 10)
 *
 * @module utils/config
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

export const LEDGER_DIALECTS = ['sqlite'] as const;

export type LedgerDialect = (typeof LEDGER_DIALECTS)[number];

export const LedgerConfigSchema = z.object({
  databasesPath: z.string().min(1, 'databasesPath must not be empty'),
  busyTimeoutMs: z.number().int().nonnegative().default(30000),
  dialect: z.enum(LEDGER_DIALECTS).default('sqlite'),
  maxUploadableFiles: z.number().int().positive().default(10),
});

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;

export const DEFAULT_DATABASES_PATH = path.join(homedir(), '.upload-ledger', 'databases');

let envLoaded = false;

/**
 * Load the first .env found: UPLOAD_LEDGER_ENV_FILE, then CWD/.env.
 * Runs once per process.
 */
export function loadEnvFile(): void {
  if (envLoaded) return;
  envLoaded = true;

  const candidates = [
    process.env.UPLOAD_LEDGER_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
  ].filter((p): p is string => typeof p === 'string' && p !== '');

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      break;
    }
  }
}

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Load ledger configuration from the environment
 *
 * @throws ValidationError when a variable does not parse
 */
export function loadLedgerConfig(overrides?: Partial<LedgerConfig>): LedgerConfig {
  loadEnvFile();

  const envConfig = {
    databasesPath: process.env.UPLOAD_LEDGER_DATABASES_PATH || DEFAULT_DATABASES_PATH,
    busyTimeoutMs: parseIntEnv('UPLOAD_LEDGER_BUSY_TIMEOUT_MS'),
    dialect: process.env.UPLOAD_LEDGER_DIALECT || undefined,
    maxUploadableFiles: parseIntEnv('UPLOAD_LEDGER_MAX_FILES'),
  };

  const result = LedgerConfigSchema.safeParse({ ...envConfig, ...overrides });
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ValidationError(`Invalid ledger configuration: ${errors.join('; ')}`);
  }
  return result.data;
}
