/**
 * Response renderers
 *
 * Convert stored records into the serialization-friendly response shapes in
 * models/transfer. Amounts leave here as two-decimal strings.
 *
 * @module services/transfer/responses
 */

import type { UploadedFile } from '../../models/uploaded-file.js';
import type { ExtractionJob } from '../../models/extraction-job.js';
import type { Transaction } from '../../models/transaction.js';
import type { ExportRecord } from '../../models/export-record.js';
import type {
  ExportResponse,
  ExtractionJobResponse,
  FileUploadResponse,
  TransactionResponse,
} from '../../models/transfer.js';
import { formatAmount } from '../../utils/money.js';

export const DEFAULT_UPLOAD_MESSAGE = 'File uploaded successfully';

export function toFileUploadResponse(
  file: UploadedFile,
  message: string = DEFAULT_UPLOAD_MESSAGE
): FileUploadResponse {
  return {
    file_id: file.id,
    filename: file.filename,
    file_size: file.file_size,
    upload_date: file.upload_date,
    message,
  };
}

export function toTransactionResponse(transaction: Transaction): TransactionResponse {
  return {
    id: transaction.id,
    transaction_date: transaction.transaction_date,
    billing_date: transaction.billing_date,
    description: transaction.description,
    amount: formatAmount(transaction.amount_cents),
    page_number: transaction.page_number,
    line_number: transaction.line_number,
    created_at: transaction.created_at,
  };
}

/**
 * @param filename - Filename of the upload the job reads from
 */
export function toExtractionJobResponse(
  job: ExtractionJob,
  filename: string
): ExtractionJobResponse {
  return {
    id: job.id,
    uploaded_file_id: job.uploaded_file_id,
    status: job.status,
    started_at: job.started_at,
    completed_at: job.completed_at,
    error_message: job.error_message,
    total_transactions_found: job.total_transactions_found,
    filename,
  };
}

/**
 * Download URL for an export: `<base>/<id>/download`
 */
export function buildDownloadUrl(downloadBasePath: string, exportId: number): string {
  return `${downloadBasePath.replace(/\/+$/, '')}/${String(exportId)}/download`;
}

export function toExportResponse(record: ExportRecord, downloadBasePath: string): ExportResponse {
  return {
    export_id: record.id,
    filename: record.filename,
    format: record.format,
    created_at: record.created_at,
    download_url: buildDownloadUrl(downloadBasePath, record.id),
  };
}
