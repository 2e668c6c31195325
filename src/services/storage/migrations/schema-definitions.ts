/**
 * SQL Schema Definitions for the statement store
 *
 * Contains all table creation SQL, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * Every field constraint enforced by the zod schemas is repeated here as a
 * CHECK clause so rows written around the service still satisfy it.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/** Default for timestamp columns; matches Date#toISOString output */
const NOW_ISO = `(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

/** GLOB matching a YYYY-MM-DD shaped value */
const DATE_GLOB = `'[0-9][0-9][0-9][0-9]-[0-9][0-9]-[0-9][0-9]'`;

/**
 * Database configuration pragmas for performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA wal_autocheckpoint = 1000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Database metadata table - name and lifecycle timestamps
 */
export const CREATE_DATABASE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS database_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  database_version TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

/**
 * Uploaded files - stored statement PDFs (immutable after insert)
 */
export const CREATE_UPLOADED_FILES_TABLE = `
CREATE TABLE IF NOT EXISTS uploaded_files (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  filename TEXT NOT NULL CHECK (length(filename) <= 255),
  file_path TEXT NOT NULL CHECK (length(file_path) <= 500),
  file_size INTEGER NOT NULL CHECK (file_size >= 0),
  content_type TEXT NOT NULL CHECK (length(content_type) <= 100),
  upload_date TEXT NOT NULL DEFAULT ${NOW_ISO}
)
`;

/**
 * Extraction jobs - one extraction attempt per row
 */
export const CREATE_EXTRACTION_JOBS_TABLE = `
CREATE TABLE IF NOT EXISTS extraction_jobs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  uploaded_file_id INTEGER NOT NULL REFERENCES uploaded_files(id) ON DELETE CASCADE,
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
  started_at TEXT,
  completed_at TEXT,
  error_message TEXT CHECK (error_message IS NULL OR length(error_message) <= 1000),
  total_transactions_found INTEGER NOT NULL DEFAULT 0 CHECK (total_transactions_found >= 0),
  extraction_metadata TEXT NOT NULL DEFAULT '{}'
    CHECK (json_valid(extraction_metadata) AND json_type(extraction_metadata) = 'object'),
  created_at TEXT NOT NULL DEFAULT ${NOW_ISO}
)
`;

/**
 * Transactions - extracted statement line items, amounts in integer cents
 */
export const CREATE_TRANSACTIONS_TABLE = `
CREATE TABLE IF NOT EXISTS transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  extraction_job_id INTEGER NOT NULL REFERENCES extraction_jobs(id) ON DELETE CASCADE,
  transaction_date TEXT NOT NULL CHECK (transaction_date GLOB ${DATE_GLOB}),
  billing_date TEXT CHECK (billing_date IS NULL OR billing_date GLOB ${DATE_GLOB}),
  description TEXT NOT NULL CHECK (length(description) <= 500),
  amount_cents INTEGER NOT NULL CHECK (amount_cents BETWEEN -9999999999 AND 9999999999),
  raw_text TEXT CHECK (raw_text IS NULL OR length(raw_text) <= 1000),
  page_number INTEGER,
  line_number INTEGER,
  created_at TEXT NOT NULL DEFAULT ${NOW_ISO}
)
`;

/**
 * Export records - generated Excel/CSV files for a job
 */
export const CREATE_EXPORT_RECORDS_TABLE = `
CREATE TABLE IF NOT EXISTS export_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  extraction_job_id INTEGER NOT NULL REFERENCES extraction_jobs(id) ON DELETE CASCADE,
  format TEXT NOT NULL CHECK (format IN ('excel', 'csv')),
  filename TEXT NOT NULL CHECK (length(filename) <= 255),
  file_path TEXT NOT NULL CHECK (length(file_path) <= 500),
  created_at TEXT NOT NULL DEFAULT ${NOW_ISO},
  download_count INTEGER NOT NULL DEFAULT 0 CHECK (download_count >= 0)
)
`;

/**
 * All required indexes for query performance
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_uploaded_files_upload_date ON uploaded_files(upload_date DESC)',

  'CREATE INDEX IF NOT EXISTS idx_extraction_jobs_uploaded_file_id ON extraction_jobs(uploaded_file_id)',
  'CREATE INDEX IF NOT EXISTS idx_extraction_jobs_status ON extraction_jobs(status)',

  'CREATE INDEX IF NOT EXISTS idx_transactions_extraction_job_id ON transactions(extraction_job_id)',
  'CREATE INDEX IF NOT EXISTS idx_transactions_job_date ON transactions(extraction_job_id, transaction_date)',
  'CREATE INDEX IF NOT EXISTS idx_transactions_job_amount ON transactions(extraction_job_id, amount_cents)',

  'CREATE INDEX IF NOT EXISTS idx_export_records_extraction_job_id ON export_records(extraction_job_id)',
] as const;

/**
 * Table definitions in dependency order (parents before children)
 */
export const TABLE_DEFINITIONS = [
  { name: 'database_metadata', sql: CREATE_DATABASE_METADATA_TABLE },
  { name: 'uploaded_files', sql: CREATE_UPLOADED_FILES_TABLE },
  { name: 'extraction_jobs', sql: CREATE_EXTRACTION_JOBS_TABLE },
  { name: 'transactions', sql: CREATE_TRANSACTIONS_TABLE },
  { name: 'export_records', sql: CREATE_EXPORT_RECORDS_TABLE },
] as const;

/**
 * Tables that must exist after initialization
 */
export const REQUIRED_TABLES = [
  'schema_version',
  'database_metadata',
  'uploaded_files',
  'extraction_jobs',
  'transactions',
  'export_records',
] as const;

/**
 * Indexes that must exist after initialization
 */
export const REQUIRED_INDEXES = [
  'idx_uploaded_files_upload_date',
  'idx_extraction_jobs_uploaded_file_id',
  'idx_extraction_jobs_status',
  'idx_transactions_extraction_job_id',
  'idx_transactions_job_date',
  'idx_transactions_job_amount',
  'idx_export_records_extraction_job_id',
] as const;
