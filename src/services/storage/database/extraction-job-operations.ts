/**
 * Extraction job operations for DatabaseService
 *
 * Handles CRUD and lifecycle transitions for the extraction_jobs table.
 *
 * Lifecycle: pending -> processing -> completed | failed. Each transition is a
 * single guarded UPDATE (WHERE status = ...), so a transition that does not
 * apply to the row's current status changes nothing and raises
 * INVALID_STATUS_TRANSITION; concurrent writers cannot both win.
 */

import type Database from 'better-sqlite3';
import type {
  CompleteJobOptions,
  ExtractionJob,
  JobStatus,
  ListJobsOptions,
} from '../../../models/extraction-job.js';
import type { JsonObject } from '../../../models/json.js';
import type { UploadedFile } from '../../../models/uploaded-file.js';
import type { ExtractionJobCreate } from '../../../utils/validation.js';
import { rowToExtractionJob } from './converters.js';
import { appendPagination, recordNotFound, runWithConstraintCheck } from './helpers.js';
import { getUploadedFile } from './upload-operations.js';
import { countTransactionsByJob } from './transaction-operations.js';
import { DatabaseError, DatabaseErrorCode, type ExtractionJobRow } from './types.js';

/**
 * Insert a job in pending status
 *
 * @param db - Database connection
 * @param input - Validated job input
 * @returns The stored job
 * @throws DatabaseError FOREIGN_KEY_VIOLATION if the upload does not exist
 */
export function createExtractionJob(
  db: Database.Database,
  input: ExtractionJobCreate
): ExtractionJob {
  const stmt = db.prepare<[number, string], ExtractionJobRow>(`
    INSERT INTO extraction_jobs (uploaded_file_id, extraction_metadata)
    VALUES (?, ?)
    RETURNING *
  `);

  const row = runWithConstraintCheck(
    'inserting extraction job',
    () => stmt.get(input.uploaded_file_id, JSON.stringify(input.extraction_metadata ?? {})),
    'uploaded_file_id'
  );
  if (!row) {
    throw new Error(`INSERT into extraction_jobs returned no row for upload ${String(input.uploaded_file_id)}`);
  }
  return rowToExtractionJob(row);
}

/**
 * Get an extraction job by ID
 */
export function getExtractionJob(db: Database.Database, id: number): ExtractionJob | null {
  const row = db
    .prepare<[number], ExtractionJobRow>('SELECT * FROM extraction_jobs WHERE id = ?')
    .get(id);
  return row ? rowToExtractionJob(row) : null;
}

/**
 * Get an extraction job by ID, failing when it does not exist
 */
export function requireExtractionJob(db: Database.Database, id: number): ExtractionJob {
  const job = getExtractionJob(db, id);
  if (!job) {
    throw recordNotFound('Extraction job', id);
  }
  return job;
}

/**
 * Get a job together with the upload it reads from
 */
export function getExtractionJobWithFile(
  db: Database.Database,
  id: number
): { job: ExtractionJob; file: UploadedFile } | null {
  const job = getExtractionJob(db, id);
  if (!job) return null;

  const file = getUploadedFile(db, job.uploaded_file_id);
  if (!file) {
    throw new DatabaseError(
      `Extraction job ${String(id)} references missing uploaded file ${String(job.uploaded_file_id)}`,
      DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
      undefined,
      'uploaded_file_id'
    );
  }
  return { job, file };
}

/**
 * List extraction jobs, newest first
 */
export function listExtractionJobs(
  db: Database.Database,
  options?: ListJobsOptions
): ExtractionJob[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options?.uploaded_file_id !== undefined) {
    conditions.push('uploaded_file_id = ?');
    params.push(options.uploaded_file_id);
  }
  if (options?.status !== undefined) {
    conditions.push('status = ?');
    params.push(options.status);
  }

  const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
  const query = appendPagination(
    `SELECT * FROM extraction_jobs${where} ORDER BY created_at DESC, id DESC`,
    params,
    options
  );

  return db.prepare<unknown[], ExtractionJobRow>(query).all(...params).map(rowToExtractionJob);
}

/**
 * Raise RECORD_NOT_FOUND, CONSTRAINT_VIOLATION (finish time before started_at)
 * or INVALID_STATUS_TRANSITION after a guarded UPDATE matched no row
 */
function rejectTransition(
  db: Database.Database,
  id: number,
  target: JobStatus,
  finishedAt?: string
): never {
  const job = requireExtractionJob(db, id);
  if (
    finishedAt !== undefined &&
    job.status === 'processing' &&
    job.started_at !== null &&
    job.started_at > finishedAt
  ) {
    throw new DatabaseError(
      `Extraction job ${String(id)} cannot finish at ${finishedAt}, before it started at ${job.started_at}`,
      DatabaseErrorCode.CONSTRAINT_VIOLATION,
      undefined,
      'completed_at'
    );
  }
  throw new DatabaseError(
    `Cannot move extraction job ${String(id)} from ${job.status} to ${target}`,
    DatabaseErrorCode.INVALID_STATUS_TRANSITION,
    undefined,
    'status'
  );
}

/**
 * pending -> processing; sets started_at
 */
export function startExtractionJob(
  db: Database.Database,
  id: number,
  startedAt: string
): ExtractionJob {
  const result = db
    .prepare(
      `UPDATE extraction_jobs SET status = 'processing', started_at = ?
       WHERE id = ? AND status = 'pending'`
    )
    .run(startedAt, id);

  if (result.changes === 0) {
    rejectTransition(db, id, 'processing');
  }
  return requireExtractionJob(db, id);
}

/**
 * processing -> completed; sets completed_at and total_transactions_found.
 * The total defaults to the number of transactions stored for the job.
 * completed_at may not precede started_at.
 */
export function completeExtractionJob(
  db: Database.Database,
  id: number,
  options: Required<Pick<CompleteJobOptions, 'completed_at'>> &
    Pick<CompleteJobOptions, 'total_transactions_found'>
): ExtractionJob {
  const complete = db.transaction(() => {
    const total = options.total_transactions_found ?? countTransactionsByJob(db, id);
    const result = db
      .prepare(
        `UPDATE extraction_jobs
         SET status = 'completed', completed_at = ?, total_transactions_found = ?
         WHERE id = ? AND status = 'processing' AND (started_at IS NULL OR started_at <= ?)`
      )
      .run(options.completed_at, total, id, options.completed_at);

    if (result.changes === 0) {
      rejectTransition(db, id, 'completed', options.completed_at);
    }
  });

  complete();
  return requireExtractionJob(db, id);
}

/**
 * pending | processing -> failed; sets error_message and completed_at, which
 * may not precede started_at
 */
export function failExtractionJob(
  db: Database.Database,
  id: number,
  errorMessage: string,
  failedAt: string
): ExtractionJob {
  const result = db
    .prepare(
      `UPDATE extraction_jobs SET status = 'failed', error_message = ?, completed_at = ?
       WHERE id = ? AND status IN ('pending', 'processing')
         AND (started_at IS NULL OR started_at <= ?)`
    )
    .run(errorMessage, failedAt, id, failedAt);

  if (result.changes === 0) {
    rejectTransition(db, id, 'failed', failedAt);
  }
  return requireExtractionJob(db, id);
}

/**
 * Shallow-merge keys into extraction_metadata
 */
export function updateExtractionMetadata(
  db: Database.Database,
  id: number,
  patch: JsonObject
): ExtractionJob {
  const update = db.transaction(() => {
    const job = requireExtractionJob(db, id);
    const merged: JsonObject = { ...job.extraction_metadata, ...patch };
    db.prepare('UPDATE extraction_jobs SET extraction_metadata = ? WHERE id = ?').run(
      JSON.stringify(merged),
      id
    );
  });

  update();
  return requireExtractionJob(db, id);
}

/**
 * Delete a job with its transactions and export records
 *
 * @returns true if a record was deleted
 */
export function deleteExtractionJob(db: Database.Database, id: number): boolean {
  return db.prepare('DELETE FROM extraction_jobs WHERE id = ?').run(id).changes > 0;
}
