/**
 * Export record operations for DatabaseService
 */

import type Database from 'better-sqlite3';
import type { ExportRecord } from '../../../models/export-record.js';
import type { ExportRecordCreate } from '../../../utils/validation.js';
import { rowToExportRecord } from './converters.js';
import { recordNotFound, runWithConstraintCheck } from './helpers.js';
import type { ExportRecordRow } from './types.js';

/**
 * Record a generated export file
 *
 * @throws DatabaseError FOREIGN_KEY_VIOLATION if the job does not exist
 */
export function insertExportRecord(
  db: Database.Database,
  data: ExportRecordCreate
): ExportRecord {
  const stmt = db.prepare<[number, string, string, string], ExportRecordRow>(`
    INSERT INTO export_records (extraction_job_id, format, filename, file_path)
    VALUES (?, ?, ?, ?)
    RETURNING *
  `);

  const row = runWithConstraintCheck(
    'inserting export record',
    () => stmt.get(data.extraction_job_id, data.format, data.filename, data.file_path),
    'extraction_job_id'
  );
  if (!row) {
    throw new Error(`INSERT into export_records returned no row for "${data.filename}"`);
  }
  return rowToExportRecord(row);
}

export function getExportRecord(db: Database.Database, id: number): ExportRecord | null {
  const row = db
    .prepare<[number], ExportRecordRow>('SELECT * FROM export_records WHERE id = ?')
    .get(id);
  return row ? rowToExportRecord(row) : null;
}

/**
 * List a job's exports, newest first
 */
export function listExportRecordsByJob(db: Database.Database, jobId: number): ExportRecord[] {
  return db
    .prepare<[number], ExportRecordRow>(
      'SELECT * FROM export_records WHERE extraction_job_id = ? ORDER BY created_at DESC, id DESC'
    )
    .all(jobId)
    .map(rowToExportRecord);
}

/**
 * Atomically bump download_count
 *
 * @returns The new count
 * @throws DatabaseError RECORD_NOT_FOUND if the export does not exist
 */
export function incrementDownloadCount(db: Database.Database, id: number): number {
  const row = db
    .prepare<[number], { download_count: number }>(
      'UPDATE export_records SET download_count = download_count + 1 WHERE id = ? RETURNING download_count'
    )
    .get(id);
  if (!row) throw recordNotFound('Export record', id);
  return row.download_count;
}

export function deleteExportRecord(db: Database.Database, id: number): boolean {
  return db.prepare('DELETE FROM export_records WHERE id = ?').run(id).changes > 0;
}
