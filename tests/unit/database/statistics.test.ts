/**
 * Aggregate Tests
 *
 * ExtractionSummary and ProcessingStatistics projections.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import {
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  createTestTransaction,
  createTestUpload,
  DatabaseService,
} from './helpers.js';

describe('DatabaseService - Statistics', () => {
  let testDir: string;
  let dbService: DatabaseService;

  beforeAll(() => {
    testDir = createTestDir('stmt-stats-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    dbService = createFreshDatabase(testDir, 'stats');
  });

  afterEach(() => {
    dbService.close();
  });

  describe('getExtractionSummary()', () => {
    it('summarizes a completed job', () => {
      const file = dbService.insertUploadedFile(createTestUpload({ filename: 'april.pdf' }));
      const job = dbService.createExtractionJob({ uploaded_file_id: file.id });
      dbService.startExtractionJob(job.id, '2024-04-01T12:00:00Z');
      dbService.insertTransactions([
        createTestTransaction(job.id, { transaction_date: '2024-03-15', amount: '-20.00' }),
        createTestTransaction(job.id, { transaction_date: '2024-03-01', amount: '4.50' }),
        createTestTransaction(job.id, { transaction_date: '2024-03-09', amount: '0.05' }),
      ]);
      dbService.completeExtractionJob(job.id, { completed_at: '2024-04-01T12:01:30Z' });

      expect(dbService.getExtractionSummary(job.id)).toEqual({
        job_id: job.id,
        filename: 'april.pdf',
        status: 'completed',
        total_transactions: 3,
        date_range: { start: '2024-03-01', end: '2024-03-15' },
        total_amount: '-15.45',
        processing_time: 90,
      });
    });

    it('uses nulls for a job without transactions or timing', () => {
      const file = dbService.insertUploadedFile(createTestUpload({ filename: 'empty.pdf' }));
      const job = dbService.createExtractionJob({ uploaded_file_id: file.id });

      expect(dbService.getExtractionSummary(job.id)).toEqual({
        job_id: job.id,
        filename: 'empty.pdf',
        status: 'pending',
        total_transactions: 0,
        date_range: null,
        total_amount: null,
        processing_time: null,
      });
    });

    it('reports a missing job', () => {
      expect(() => dbService.getExtractionSummary(3)).toThrow('Extraction job 3 not found');
    });
  });

  describe('getProcessingStatistics()', () => {
    it('returns zeros for an empty database', () => {
      expect(dbService.getProcessingStatistics()).toEqual({
        total_files_uploaded: 0,
        total_jobs_completed: 0,
        total_transactions_extracted: 0,
        average_processing_time: null,
        success_rate: 0,
      });
    });

    it('aggregates over all jobs', () => {
      const first = dbService.insertUploadedFile(createTestUpload());
      const second = dbService.insertUploadedFile(createTestUpload());

      const fast = dbService.createExtractionJob({ uploaded_file_id: first.id });
      dbService.startExtractionJob(fast.id, '2024-04-01T12:00:00Z');
      dbService.insertTransactions([
        createTestTransaction(fast.id, { line_number: 1 }),
        createTestTransaction(fast.id, { line_number: 2 }),
      ]);
      dbService.completeExtractionJob(fast.id, { completed_at: '2024-04-01T12:00:30Z' });

      const slow = dbService.createExtractionJob({ uploaded_file_id: second.id });
      dbService.startExtractionJob(slow.id, '2024-04-02T10:00:00Z');
      dbService.insertTransaction(createTestTransaction(slow.id));
      dbService.completeExtractionJob(slow.id, { completed_at: '2024-04-02T10:01:30Z' });

      const broken = dbService.createExtractionJob({ uploaded_file_id: second.id });
      dbService.failExtractionJob(broken.id, 'unreadable scan');

      dbService.createExtractionJob({ uploaded_file_id: first.id });

      expect(dbService.getProcessingStatistics()).toEqual({
        total_files_uploaded: 2,
        total_jobs_completed: 2,
        total_transactions_extracted: 3,
        average_processing_time: 60,
        success_rate: 50,
      });
    });
  });
});
