/**
 * Upload Ledger - Data Models
 *
 * Barrel export for all model interfaces.
 */

// File models
export * from './file-record.js';

// Run/lumi models
export * from './run.js';

// Block models
export * from './block.js';
