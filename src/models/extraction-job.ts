/**
 * ExtractionJob interfaces
 *
 * One attempt to extract transactions from an uploaded file.
 */

import type { JsonObject } from './json.js';

/**
 * Job status values, in lifecycle order
 */
export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

/**
 * Job status throughout the extraction lifecycle
 * pending -> processing -> completed | failed
 */
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface ExtractionJob {
  id: number;

  /** Upload this job reads from */
  uploaded_file_id: number;

  status: JobStatus;

  /** ISO 8601 timestamp, set when the job enters processing */
  started_at: string | null;

  /** ISO 8601 timestamp, set when the job completes or fails */
  completed_at: string | null;

  /** Failure reason (max 1000 chars) */
  error_message: string | null;

  total_transactions_found: number;

  /** Free-form extractor metadata (parser name, page count, bank hints...) */
  extraction_metadata: JsonObject;
}

/**
 * Options for completing a job
 */
export interface CompleteJobOptions {
  /** Defaults to the number of transactions stored for the job */
  total_transactions_found?: number;
  completed_at?: string;
}

/**
 * Options for listing jobs
 */
export interface ListJobsOptions {
  uploaded_file_id?: number;
  status?: JobStatus;
  limit?: number;
  offset?: number;
}
