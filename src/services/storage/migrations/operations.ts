/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * checkSchemaVersion, and getCurrentSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  createTables,
  createIndexes,
  initializeDatabaseMetadata,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Read the schema version stamped in the database
 *
 * @param db - Database instance from better-sqlite3
 * @returns The stored version, or 0 for an uninitialized database
 * @throws MigrationError if the version cannot be read
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db
      .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
      .get(1);

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Get the current schema version constant
 * @returns The current schema version number
 */
export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables, indexes, and configuration
 *
 * Idempotent: tables and indexes are created only if they don't exist.
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database): void {
  // Pragmas cannot change inside a transaction
  configurePragmas(db);

  // Version is stamped last so a crash mid-init leaves version 0 and a clean re-init
  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeDatabaseMetadata(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Bring a database to the current schema version
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if the database is newer than this build
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion === SCHEMA_VERSION) {
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }

  // Versions between 1 and SCHEMA_VERSION get their step functions here as the schema evolves
  throw new MigrationError(
    `No migration path from schema version ${String(currentVersion)} to ${String(SCHEMA_VERSION)}`,
    'version_check',
    undefined
  );
}
