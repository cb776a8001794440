/**
 * Upload Ledger - Zod Validation Schemas
 *
 * Input validation for every value that crosses into the ledger:
 * LFNs, dataset paths, algorithms, site names, run numbers and statuses.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { UPLOAD_STATUSES } from '../models/file-record.js';
import { BLOCK_STATUSES } from '../models/block.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError with every issue joined into one message
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCALAR SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const LfnSchema = z
  .string()
  .min(1, 'LFN must not be empty')
  .max(1024, 'LFN must be at most 1024 characters')
  .refine((lfn) => !/\s/.test(lfn), 'LFN must not contain whitespace');

export const LfnListSchema = z.array(LfnSchema);

/**
 * Dataset paths are slash-separated: /Primary/Processed/Tier
 */
export const DatasetPathSchema = z
  .string()
  .regex(/^(\/[^/\s]+)+$/, 'Dataset path must look like /Primary/Processed/Tier');

export const FileIdSchema = z.number().int().positive('File id must be a positive integer');

export const FileIdListSchema = z.array(FileIdSchema);

export const SiteNameSchema = z.string().min(1, 'Site name must not be empty');

export const SiteListSchema = z.array(SiteNameSchema);

export const BlockNameSchema = z.string().min(1, 'Block name must not be empty');

export const NonNegativeIntSchema = z.number().int().nonnegative();

export const MaxFilesSchema = z.number().int().positive('maxFiles must be a positive integer');

export const UploadStatusSchema = z.enum(UPLOAD_STATUSES);

export const BlockStatusSchema = z.enum(BLOCK_STATUSES);

// ═══════════════════════════════════════════════════════════════════════════════
// COMPOSITE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const AlgorithmSchema = z.object({
  appName: z.string().min(1, 'appName is required'),
  appVer: z.string().min(1, 'appVer is required'),
  appFam: z.string().min(1, 'appFam is required'),
  psetHash: z.string().min(1, 'psetHash is required'),
  configContent: z.string(),
});

export const ChecksumMapSchema = z.record(
  z.string().min(1, 'Checksum type must not be empty'),
  z.string().min(1, 'Checksum digest must not be empty')
);

export const FileRecordInitSchema = z
  .object({
    id: FileIdSchema.optional(),
    lfn: LfnSchema.optional(),
    size: NonNegativeIntSchema.default(0),
    events: NonNegativeIntSchema.default(0),
    checksums: ChecksumMapSchema.default({}),
  })
  .refine((init) => init.id !== undefined || init.lfn !== undefined, {
    message: 'A file needs an id or an LFN',
  });

export const RunSchema = z.object({
  run: NonNegativeIntSchema,
  lumis: z.array(NonNegativeIntSchema),
});
