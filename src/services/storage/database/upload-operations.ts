/**
 * Upload operations for DatabaseService
 *
 * Handles CRUD operations for the uploaded_files table. Uploads are
 * immutable once recorded, so there is no update operation.
 */

import type Database from 'better-sqlite3';
import type { UploadedFile } from '../../../models/uploaded-file.js';
import type { UploadedFileCreate } from '../../../utils/validation.js';
import { nowIso } from '../../../utils/dates.js';
import { appendPagination, recordNotFound, runWithConstraintCheck } from './helpers.js';
import type { PaginationOptions } from './types.js';

/**
 * Insert an uploaded file record
 *
 * @param db - Database connection
 * @param data - Validated upload data; upload_date defaults to now
 * @returns The stored upload
 */
export function insertUploadedFile(db: Database.Database, data: UploadedFileCreate): UploadedFile {
  const stmt = db.prepare<unknown[], UploadedFile>(`
    INSERT INTO uploaded_files (filename, file_path, file_size, content_type, upload_date)
    VALUES (?, ?, ?, ?, ?)
    RETURNING *
  `);

  const row = runWithConstraintCheck('inserting uploaded file', () =>
    stmt.get(
      data.filename,
      data.file_path,
      data.file_size,
      data.content_type,
      data.upload_date ?? nowIso()
    )
  );
  if (!row) {
    throw new Error(`INSERT into uploaded_files returned no row for "${data.filename}"`);
  }
  return row;
}

/**
 * Get an uploaded file by ID
 *
 * @param db - Database connection
 * @param id - Uploaded file ID
 * @returns UploadedFile | null
 */
export function getUploadedFile(db: Database.Database, id: number): UploadedFile | null {
  return (
    db.prepare<[number], UploadedFile>('SELECT * FROM uploaded_files WHERE id = ?').get(id) ?? null
  );
}

/**
 * Get an uploaded file by ID, failing when it does not exist
 */
export function requireUploadedFile(db: Database.Database, id: number): UploadedFile {
  const file = getUploadedFile(db, id);
  if (!file) {
    throw recordNotFound('Uploaded file', id);
  }
  return file;
}

/**
 * List uploaded files, newest first
 *
 * @param db - Database connection
 * @param options - Optional limit/offset
 */
export function listUploadedFiles(
  db: Database.Database,
  options?: PaginationOptions
): UploadedFile[] {
  const params: unknown[] = [];
  const query = appendPagination(
    'SELECT * FROM uploaded_files ORDER BY upload_date DESC, id DESC',
    params,
    options
  );
  return db.prepare<unknown[], UploadedFile>(query).all(...params);
}

/**
 * Delete an uploaded file record together with its jobs, their transactions
 * and export records (ON DELETE CASCADE)
 *
 * @returns true if a record was deleted
 */
export function deleteUploadedFile(db: Database.Database, id: number): boolean {
  return db.prepare('DELETE FROM uploaded_files WHERE id = ?').run(id).changes > 0;
}
