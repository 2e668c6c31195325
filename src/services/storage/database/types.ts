/**
 * Type definitions for DatabaseService
 *
 * Contains all interfaces, enums, and row types used by the database service.
 */

/**
 * Database information interface
 */
export interface DatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  created_at: string;
  last_modified_at: string;
  total_uploaded_files: number;
  total_extraction_jobs: number;
  total_transactions: number;
  total_export_records: number;
  /** Set when the file could not be read */
  error?: string;
}

/**
 * Limit/offset list options
 */
export interface PaginationOptions {
  limit?: number;
  offset?: number;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  RECORD_NOT_FOUND = 'RECORD_NOT_FOUND',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',
  INVALID_STATUS_TRANSITION = 'INVALID_STATUS_TRANSITION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown,
    /** Column the failure is attributed to, when known */
    public readonly field?: string
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Database row type for metadata
 */
export interface MetadataRow {
  database_name: string;
  database_version: string;
  created_at: string;
  last_modified_at: string;
}

/**
 * Database row type for extraction jobs (metadata still JSON text)
 */
export interface ExtractionJobRow {
  id: number;
  uploaded_file_id: number;
  status: string;
  started_at: string | null;
  completed_at: string | null;
  error_message: string | null;
  total_transactions_found: number;
  extraction_metadata: string;
  created_at: string;
}

/**
 * Database row type for export records
 */
export interface ExportRecordRow {
  id: number;
  extraction_job_id: number;
  format: string;
  filename: string;
  file_path: string;
  created_at: string;
  download_count: number;
}
