/**
 * Schema Verification Functions
 *
 * Contains functions to verify database schema integrity.
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

/**
 * Columns that must exist on each entity table
 */
const REQUIRED_COLUMNS: Record<string, string[]> = {
  uploaded_files: ['id', 'filename', 'file_path', 'file_size', 'content_type', 'upload_date'],
  extraction_jobs: [
    'id',
    'uploaded_file_id',
    'status',
    'started_at',
    'completed_at',
    'error_message',
    'total_transactions_found',
    'extraction_metadata',
  ],
  transactions: [
    'id',
    'extraction_job_id',
    'transaction_date',
    'billing_date',
    'description',
    'amount_cents',
    'raw_text',
    'page_number',
    'line_number',
    'created_at',
  ],
  export_records: [
    'id',
    'extraction_job_id',
    'format',
    'filename',
    'file_path',
    'created_at',
    'download_count',
  ],
};

export interface SchemaVerificationResult {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
}

function objectExists(db: Database.Database, type: 'table' | 'index', name: string): boolean {
  return (
    db
      .prepare<[string, string], { name: string }>(
        'SELECT name FROM sqlite_master WHERE type = ? AND name = ?'
      )
      .get(type, name) !== undefined
  );
}

/**
 * Verify all required tables, indexes, and columns exist
 * @param db - Database instance
 */
export function verifySchema(db: Database.Database): SchemaVerificationResult {
  const missingTables = REQUIRED_TABLES.filter((t) => !objectExists(db, 'table', t));
  const missingIndexes = REQUIRED_INDEXES.filter((i) => !objectExists(db, 'index', i));
  const missingColumns: string[] = [];

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!objectExists(db, 'table', table)) {
      continue; // reported in missingTables
    }
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`Table "${table}" is missing required column: ${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
