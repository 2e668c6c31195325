/**
 * Shared test helpers for DatabaseService tests
 *
 * Provides factories, temp directory management and database setup used
 * across all database test modules.
 */

import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '../../../src/services/storage/database.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create upload input with default values
 */
export function createTestUpload(overrides: Record<string, unknown> = {}) {
  const id = uuidv4();
  return {
    filename: `statement-${id}.pdf`,
    file_path: `/uploads/statement-${id}.pdf`,
    file_size: 2048,
    content_type: 'application/pdf',
    ...overrides,
  };
}

/**
 * Create transaction input with default values
 */
export function createTestTransaction(jobId: number, overrides: Record<string, unknown> = {}) {
  return {
    extraction_job_id: jobId,
    transaction_date: '2024-03-05',
    billing_date: '2024-03-07',
    description: 'COFFEE SHOP',
    amount: '4.50',
    raw_text: '03/05 03/07 COFFEE SHOP 4.50',
    page_number: 1,
    line_number: 1,
    ...overrides,
  };
}

/**
 * Insert an upload and a pending job for it
 */
export function createUploadWithJob(dbService: DatabaseService) {
  const file = dbService.insertUploadedFile(createTestUpload());
  const job = dbService.createExtractionJob({ uploaded_file_id: file.id });
  return { file, job };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a temporary directory for database tests
 */
export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTestDir(testDir: string): void {
  rmSync(testDir, { recursive: true, force: true });
}

/**
 * Create a unique database name
 */
export function createUniqueDatabaseName(prefix: string): string {
  return `${prefix}-${uuidv4()}`;
}

/**
 * Create a fresh database for a test
 */
export function createFreshDatabase(testDir: string, prefix: string): DatabaseService {
  return DatabaseService.create(createUniqueDatabaseName(prefix), undefined, testDir);
}

export { DatabaseService, existsSync, join };
