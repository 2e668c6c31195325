/**
 * Database Module - Public API
 *
 * Re-exports all public types, classes, and functions from the database module.
 */

export { MigrationError } from '../migrations.js';

export type { DatabaseInfo, PaginationOptions } from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService } from './service.js';
export type { RecordCounts } from './stats-operations.js';
