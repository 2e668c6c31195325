/**
 * Database Schema Migrations facade
 *
 * @module migrations
 */

export {
  MigrationError,
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
  configurePragmas,
  verifySchema,
  type SchemaVerificationResult,
} from './migrations/index.js';
