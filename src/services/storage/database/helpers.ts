/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for name validation, path resolution,
 * pagination, and constraint error handling.
 */

import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode, type PaginationOptions } from './types.js';

/**
 * Default storage path for databases, read at call time so a late-loaded
 * .env file still applies
 */
export function getDefaultStoragePath(): string {
  return (
    process.env.STATEMENT_STORE_DATABASES_PATH || join(homedir(), '.statement-store', 'databases')
  );
}

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  return join(storagePath ?? getDefaultStoragePath(), `${name}.db`);
}

/**
 * Append LIMIT/OFFSET clauses. An offset without a limit uses LIMIT -1 (unbounded).
 */
export function appendPagination(
  query: string,
  params: unknown[],
  options?: PaginationOptions
): string {
  let sql = query;
  if (options?.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(options.limit);
  }
  if (options?.offset !== undefined) {
    if (options.limit === undefined) {
      sql += ' LIMIT -1';
    }
    sql += ' OFFSET ?';
    params.push(options.offset);
  }
  return sql;
}

/**
 * Run a write, converting SQLite constraint errors to DatabaseError with a
 * specific code.
 *
 * @param context - Error context (e.g., "inserting transaction")
 * @param write - The statement execution
 * @param foreignKeyField - Column named in FOREIGN_KEY_VIOLATION errors
 */
export function runWithConstraintCheck<T>(
  context: string,
  write: () => T,
  foreignKeyField?: string
): T {
  try {
    return write();
  } catch (error) {
    if (!(error instanceof Error)) throw error;

    if (error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}${foreignKeyField ? `: ${foreignKeyField} does not reference an existing row` : ''}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error,
        foreignKeyField
      );
    }
    if (
      error.message.includes('CHECK constraint failed') ||
      error.message.includes('NOT NULL constraint failed')
    ) {
      throw new DatabaseError(
        `Constraint violation ${context}: ${error.message}`,
        DatabaseErrorCode.CONSTRAINT_VIOLATION,
        error
      );
    }
    throw error;
  }
}

/**
 * RECORD_NOT_FOUND error for a missing row
 */
export function recordNotFound(entity: string, id: number): DatabaseError {
  return new DatabaseError(`${entity} ${String(id)} not found`, DatabaseErrorCode.RECORD_NOT_FOUND);
}
