/**
 * Public API tests
 *
 * Runs an upload through extraction and export using only the package entry point.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DatabaseService,
  formatErrorResponse,
  AppError,
  toExportResponse,
  toExtractionJobResponse,
  toFileUploadResponse,
  toTransactionResponse,
} from '../../src/index.js';
import { cleanupTestDir, createTestDir, createTestTransaction, createTestUpload } from './database/helpers.js';

describe('package entry point', () => {
  let testDir: string;
  let dbService: DatabaseService;

  beforeEach(() => {
    testDir = createTestDir('stmt-db-');
    dbService = DatabaseService.create('statements', undefined, testDir);
  });

  afterEach(() => {
    dbService.close();
    cleanupTestDir(testDir);
  });

  it('runs an upload through extraction and export', () => {
    const file = dbService.insertUploadedFile(
      createTestUpload({ filename: 'march.pdf', upload_date: '2024-04-01T11:59:00.000Z' })
    );
    expect(toFileUploadResponse(file)).toEqual({
      file_id: file.id,
      filename: 'march.pdf',
      file_size: 2048,
      upload_date: '2024-04-01T11:59:00.000Z',
      message: 'File uploaded successfully',
    });

    const job = dbService.createExtractionJob({ uploaded_file_id: file.id });
    dbService.startExtractionJob(job.id, '2024-04-01T12:00:00.000Z');
    const [coffee, refund] = dbService.insertTransactions([
      createTestTransaction(job.id),
      createTestTransaction(job.id, {
        transaction_date: '2024-03-01',
        description: 'REFUND',
        amount: '-1.25',
        line_number: 2,
      }),
    ]);
    const completed = dbService.completeExtractionJob(job.id, {
      completed_at: '2024-04-01T12:00:30.000Z',
    });

    expect(toExtractionJobResponse(completed, file.filename)).toEqual({
      id: job.id,
      uploaded_file_id: file.id,
      status: 'completed',
      started_at: '2024-04-01T12:00:00.000Z',
      completed_at: '2024-04-01T12:00:30.000Z',
      error_message: null,
      total_transactions_found: 2,
      filename: 'march.pdf',
    });
    expect(toTransactionResponse(refund).amount).toBe('-1.25');
    expect(toTransactionResponse(coffee).amount).toBe('4.50');

    expect(dbService.getExtractionSummary(job.id)).toEqual({
      job_id: job.id,
      filename: 'march.pdf',
      status: 'completed',
      total_transactions: 2,
      date_range: { start: '2024-03-01', end: '2024-03-05' },
      total_amount: '3.25',
      processing_time: 30,
    });

    const record = dbService.insertExportRecord({
      extraction_job_id: job.id,
      format: 'csv',
      filename: 'march.csv',
      file_path: '/exports/march.csv',
    });
    expect(toExportResponse(record, '/api/exports/').download_url).toBe(
      `/api/exports/${String(record.id)}/download`
    );
  });

  it('renders service failures as error responses', () => {
    let response: ReturnType<typeof formatErrorResponse> | undefined;
    try {
      dbService.startExtractionJob(404);
    } catch (error) {
      response = formatErrorResponse(AppError.fromUnknown(error));
    }

    expect(response?.success).toBe(false);
    expect(response?.error.category).toBe('RECORD_NOT_FOUND');
  });
});
