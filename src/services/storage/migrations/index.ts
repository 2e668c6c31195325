/**
 * Database Schema Migrations
 *
 * Handles SQLite schema initialization, version checks, and verification.
 * All SQL uses parameterized queries via db.prepare().
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
} from './operations.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema, type SchemaVerificationResult } from './verification.js';
