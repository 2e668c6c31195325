/**
 * Export Record Operations Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import {
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  createUploadWithJob,
  DatabaseService,
} from './helpers.js';
import { toExportResponse } from '../../../src/services/transfer/responses.js';

describe('DatabaseService - Export Records', () => {
  let testDir: string;
  let dbService: DatabaseService;
  let jobId: number;

  beforeAll(() => {
    testDir = createTestDir('stmt-export-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    dbService = createFreshDatabase(testDir, 'exports');
    jobId = createUploadWithJob(dbService).job.id;
  });

  afterEach(() => {
    dbService.close();
  });

  it('records an export with a zero download count', () => {
    const record = dbService.insertExportRecord({
      extraction_job_id: jobId,
      format: 'excel',
      filename: 'march.xlsx',
      file_path: '/exports/march.xlsx',
    });

    expect(record.id).toBe(1);
    expect(record.format).toBe('excel');
    expect(record.download_count).toBe(0);
    expect(dbService.getExportRecord(record.id)).toEqual(record);
  });

  it('rejects an unknown format', () => {
    expect(() =>
      dbService.insertExportRecord({
        extraction_job_id: jobId,
        format: 'pdf',
        filename: 'march.pdf',
        file_path: '/exports/march.pdf',
      })
    ).toThrow(/^format: /);
  });

  it('rejects an export for a job that does not exist', () => {
    expect(() =>
      dbService.insertExportRecord({
        extraction_job_id: 77,
        format: 'csv',
        filename: 'x.csv',
        file_path: '/exports/x.csv',
      })
    ).toThrow(
      'Foreign key violation inserting export record: extraction_job_id does not reference an existing row'
    );
  });

  it('increments the download count and returns the new value', () => {
    const record = dbService.insertExportRecord({
      extraction_job_id: jobId,
      format: 'csv',
      filename: 'march.csv',
      file_path: '/exports/march.csv',
    });

    expect(dbService.incrementDownloadCount(record.id)).toBe(1);
    expect(dbService.incrementDownloadCount(record.id)).toBe(2);
    expect(dbService.getExportRecord(record.id)?.download_count).toBe(2);
  });

  it('reports a missing export when incrementing', () => {
    expect(() => dbService.incrementDownloadCount(9)).toThrow('Export record 9 not found');
  });

  it('lists exports of a job newest first', () => {
    const first = dbService.insertExportRecord({
      extraction_job_id: jobId,
      format: 'csv',
      filename: 'a.csv',
      file_path: '/exports/a.csv',
    });
    const second = dbService.insertExportRecord({
      extraction_job_id: jobId,
      format: 'excel',
      filename: 'b.xlsx',
      file_path: '/exports/b.xlsx',
    });

    expect(dbService.listExportRecordsByJob(jobId).map((r) => r.id)).toEqual([
      second.id,
      first.id,
    ]);
  });

  it('deletes an export', () => {
    const record = dbService.insertExportRecord({
      extraction_job_id: jobId,
      format: 'csv',
      filename: 'a.csv',
      file_path: '/exports/a.csv',
    });

    expect(dbService.deleteExportRecord(record.id)).toBe(true);
    expect(dbService.getExportRecord(record.id)).toBeNull();
  });

  it('renders a download URL from the configured base path', () => {
    const record = dbService.insertExportRecord({
      extraction_job_id: jobId,
      format: 'excel',
      filename: 'march.xlsx',
      file_path: '/exports/march.xlsx',
    });

    expect(toExportResponse(record, '/api/exports')).toEqual({
      export_id: record.id,
      filename: 'march.xlsx',
      format: 'excel',
      created_at: record.created_at,
      download_url: `/api/exports/${String(record.id)}/download`,
    });
  });
});
