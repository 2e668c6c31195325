/**
 * Data Models
 *
 * Barrel export for all model interfaces.
 */

export * from './json.js';
export * from './uploaded-file.js';
export * from './extraction-job.js';
export * from './transaction.js';
export * from './export-record.js';
export * from './transfer.js';
