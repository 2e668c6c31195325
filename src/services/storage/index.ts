/**
 * Storage Service Module
 *
 * Database initialization, migrations, and record storage for statement
 * extraction data.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
  type SchemaVerificationResult,
} from './migrations.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  type DatabaseInfo,
  type PaginationOptions,
  type RecordCounts,
} from './database.js';
