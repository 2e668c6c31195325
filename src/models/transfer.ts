/**
 * Response shapes rendered at the API boundary
 *
 * Dates are YYYY-MM-DD strings, timestamps full ISO 8601 strings and amounts
 * two-decimal strings, so every value survives JSON serialization unchanged.
 * Request shapes are derived from the zod schemas in utils/validation.
 */

import type { JobStatus } from './extraction-job.js';
import type { FileFormat } from './export-record.js';

export interface FileUploadResponse {
  file_id: number;
  filename: string;
  file_size: number;
  /** ISO 8601 timestamp */
  upload_date: string;
  message: string;
}

export interface TransactionResponse {
  id: number;
  transaction_date: string;
  billing_date: string | null;
  description: string;
  /** Two-decimal string, e.g. "-12.50" */
  amount: string;
  page_number: number | null;
  line_number: number | null;
  created_at: string;
}

export interface ExtractionJobResponse {
  id: number;
  uploaded_file_id: number;
  status: JobStatus;
  started_at: string | null;
  completed_at: string | null;
  error_message: string | null;
  total_transactions_found: number;
  /** Filename of the related upload */
  filename: string;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface ExtractionSummary {
  job_id: number;
  filename: string;
  status: JobStatus;
  total_transactions: number;
  /** Earliest and latest transaction_date; null when the job has no transactions */
  date_range: DateRange | null;
  /** Sum of amounts as a two-decimal string; null when the job has no transactions */
  total_amount: string | null;
  /** Seconds between started_at and completed_at */
  processing_time: number | null;
}

export interface ExportResponse {
  export_id: number;
  filename: string;
  format: FileFormat;
  created_at: string;
  download_url: string;
}

export interface ProcessingStatistics {
  total_files_uploaded: number;
  total_jobs_completed: number;
  total_transactions_extracted: number;
  /** Mean seconds from start to completion over completed jobs */
  average_processing_time: number | null;
  /** Percentage (0-100) of jobs that completed */
  success_rate: number;
}
