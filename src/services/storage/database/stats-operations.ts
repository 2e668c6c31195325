/**
 * Statistics operations for DatabaseService
 *
 * Read-only projections over jobs and transactions, plus the metadata
 * bookkeeping touched on every write.
 */

import type Database from 'better-sqlite3';
import type { ExtractionSummary, ProcessingStatistics } from '../../../models/transfer.js';
import { formatAmount } from '../../../utils/money.js';
import { secondsBetween } from '../../../utils/dates.js';
import { getExtractionJobWithFile } from './extraction-job-operations.js';
import { recordNotFound } from './helpers.js';

/**
 * Row counts per table
 */
export interface RecordCounts {
  uploaded_files: number;
  extraction_jobs: number;
  transactions: number;
  export_records: number;
}

export function getRecordCounts(db: Database.Database): RecordCounts {
  const row = db
    .prepare<[], RecordCounts>(
      `
    SELECT
      (SELECT COUNT(*) FROM uploaded_files) as uploaded_files,
      (SELECT COUNT(*) FROM extraction_jobs) as extraction_jobs,
      (SELECT COUNT(*) FROM transactions) as transactions,
      (SELECT COUNT(*) FROM export_records) as export_records
  `
    )
    .get();
  return row ?? { uploaded_files: 0, extraction_jobs: 0, transactions: 0, export_records: 0 };
}

/**
 * Summarize one job: stored transaction count, date range, total amount and
 * processing time
 *
 * @throws DatabaseError RECORD_NOT_FOUND if the job does not exist
 */
export function getExtractionSummary(db: Database.Database, jobId: number): ExtractionSummary {
  const joined = getExtractionJobWithFile(db, jobId);
  if (!joined) {
    throw recordNotFound('Extraction job', jobId);
  }
  const { job, file } = joined;

  const agg = db
    .prepare<
      [number],
      {
        count: number;
        first_date: string | null;
        last_date: string | null;
        total_cents: number | null;
      }
    >(
      `
    SELECT
      COUNT(*) as count,
      MIN(transaction_date) as first_date,
      MAX(transaction_date) as last_date,
      SUM(amount_cents) as total_cents
    FROM transactions WHERE extraction_job_id = ?
  `
    )
    .get(jobId);

  const count = agg?.count ?? 0;
  const dateRange =
    count > 0 && agg?.first_date && agg.last_date
      ? { start: agg.first_date, end: agg.last_date }
      : null;
  const totalCents = count > 0 ? (agg?.total_cents ?? null) : null;

  return {
    job_id: job.id,
    filename: file.filename,
    status: job.status,
    total_transactions: count,
    date_range: dateRange,
    total_amount: totalCents === null ? null : formatAmount(totalCents),
    processing_time:
      job.started_at !== null && job.completed_at !== null
        ? secondsBetween(job.started_at, job.completed_at)
        : null,
  };
}

/**
 * Aggregate statistics over the whole database
 */
export function getProcessingStatistics(db: Database.Database): ProcessingStatistics {
  const counts = db
    .prepare<
      [],
      { files: number; jobs: number; completed: number; transactions: number }
    >(
      `
    SELECT
      (SELECT COUNT(*) FROM uploaded_files) as files,
      (SELECT COUNT(*) FROM extraction_jobs) as jobs,
      (SELECT COUNT(*) FROM extraction_jobs WHERE status = 'completed') as completed,
      (SELECT COUNT(*) FROM transactions) as transactions
  `
    )
    .get();

  const timings = db
    .prepare<[], { started_at: string; completed_at: string }>(
      `SELECT started_at, completed_at FROM extraction_jobs
       WHERE status = 'completed' AND started_at IS NOT NULL AND completed_at IS NOT NULL`
    )
    .all();

  const averageProcessingTime =
    timings.length > 0
      ? timings.reduce((sum, t) => sum + secondsBetween(t.started_at, t.completed_at), 0) /
        timings.length
      : null;

  const jobs = counts?.jobs ?? 0;
  const completed = counts?.completed ?? 0;

  return {
    total_files_uploaded: counts?.files ?? 0,
    total_jobs_completed: completed,
    total_transactions_extracted: counts?.transactions ?? 0,
    average_processing_time: averageProcessingTime,
    success_rate: jobs > 0 ? (completed / jobs) * 100 : 0,
  };
}

/**
 * Update metadata last_modified_at timestamp
 *
 * @param db - Database connection
 */
export function updateMetadataModified(db: Database.Database): void {
  db.prepare('UPDATE database_metadata SET last_modified_at = ? WHERE id = 1').run(
    new Date().toISOString()
  );
}
