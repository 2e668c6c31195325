/**
 * DatabaseService class for all database operations
 *
 * Provides CRUD operations for uploaded files, extraction jobs, transactions
 * and export records. Public methods accept raw input, validate it with the
 * zod schemas in utils/validation, then delegate to the per-table operation
 * modules. Uses prepared statements throughout.
 */

import Database from 'better-sqlite3';
import type { UploadedFile } from '../../../models/uploaded-file.js';
import type { ExtractionJob } from '../../../models/extraction-job.js';
import type { Transaction } from '../../../models/transaction.js';
import type { ExportRecord } from '../../../models/export-record.js';
import type { ExtractionSummary, ProcessingStatistics } from '../../../models/transfer.js';
import {
  validateInput,
  ErrorMessageInput,
  ExportRecordCreate,
  ExtractionJobCompleteInput,
  ExtractionJobCreate,
  ExtractionJobListInput,
  IsoTimestamp,
  JsonObjectSchema,
  PaginationInput,
  RecordId,
  TransactionCreate,
  TransactionFilter,
  TransactionUpdate,
  UploadedFileCreate,
} from '../../../utils/validation.js';
import { nowIso } from '../../../utils/dates.js';
import { verifySchema, type SchemaVerificationResult } from '../migrations.js';
import type { DatabaseInfo } from './types.js';
import {
  createDatabase,
  openDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
} from './static-operations.js';
import {
  getExtractionSummary,
  getProcessingStatistics,
  updateMetadataModified,
} from './stats-operations.js';
import * as uploadOps from './upload-operations.js';
import * as jobOps from './extraction-job-operations.js';
import * as txOps from './transaction-operations.js';
import * as exportOps from './export-operations.js';

const TransactionCreateList = TransactionCreate.array();

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, description?: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, description, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static list(storagePath?: string): DatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  getConnection(): Database.Database {
    return this.db;
  }

  verify(): SchemaVerificationResult {
    return verifySchema(this.db);
  }

  /**
   * Run a write and stamp database_metadata.last_modified_at in the same transaction
   */
  private write<T>(fn: () => T): T {
    return this.db.transaction(() => {
      const result = fn();
      updateMetadataModified(this.db);
      return result;
    })();
  }

  // ==================== UPLOADED FILE OPERATIONS ====================

  insertUploadedFile(input: unknown): UploadedFile {
    const data = validateInput(UploadedFileCreate, input);
    return this.write(() => uploadOps.insertUploadedFile(this.db, data));
  }

  getUploadedFile(id: number): UploadedFile | null {
    return uploadOps.getUploadedFile(this.db, validateInput(RecordId, id));
  }

  listUploadedFiles(options?: unknown): UploadedFile[] {
    return uploadOps.listUploadedFiles(this.db, validateInput(PaginationInput, options ?? {}));
  }

  deleteUploadedFile(id: number): boolean {
    const validId = validateInput(RecordId, id);
    return this.write(() => uploadOps.deleteUploadedFile(this.db, validId));
  }

  // ==================== EXTRACTION JOB OPERATIONS ====================

  createExtractionJob(input: unknown): ExtractionJob {
    const data = validateInput(ExtractionJobCreate, input);
    return this.write(() => jobOps.createExtractionJob(this.db, data));
  }

  getExtractionJob(id: number): ExtractionJob | null {
    return jobOps.getExtractionJob(this.db, validateInput(RecordId, id));
  }

  getExtractionJobWithFile(id: number): { job: ExtractionJob; file: UploadedFile } | null {
    return jobOps.getExtractionJobWithFile(this.db, validateInput(RecordId, id));
  }

  listExtractionJobs(options?: unknown): ExtractionJob[] {
    return jobOps.listExtractionJobs(this.db, validateInput(ExtractionJobListInput, options ?? {}));
  }

  startExtractionJob(id: number, startedAt?: string): ExtractionJob {
    const validId = validateInput(RecordId, id);
    const at = startedAt === undefined ? nowIso() : validateInput(IsoTimestamp, startedAt);
    return this.write(() => jobOps.startExtractionJob(this.db, validId, at));
  }

  completeExtractionJob(id: number, options?: unknown): ExtractionJob {
    const validId = validateInput(RecordId, id);
    const data = validateInput(ExtractionJobCompleteInput, options ?? {});
    return this.write(() =>
      jobOps.completeExtractionJob(this.db, validId, {
        total_transactions_found: data.total_transactions_found,
        completed_at: data.completed_at ?? nowIso(),
      })
    );
  }

  failExtractionJob(id: number, errorMessage: string, failedAt?: string): ExtractionJob {
    const validId = validateInput(RecordId, id);
    const message = validateInput(ErrorMessageInput, errorMessage);
    const at = failedAt === undefined ? nowIso() : validateInput(IsoTimestamp, failedAt);
    return this.write(() => jobOps.failExtractionJob(this.db, validId, message, at));
  }

  updateExtractionMetadata(id: number, patch: unknown): ExtractionJob {
    const validId = validateInput(RecordId, id);
    const data = validateInput(JsonObjectSchema, patch);
    return this.write(() => jobOps.updateExtractionMetadata(this.db, validId, data));
  }

  deleteExtractionJob(id: number): boolean {
    const validId = validateInput(RecordId, id);
    return this.write(() => jobOps.deleteExtractionJob(this.db, validId));
  }

  // ==================== TRANSACTION OPERATIONS ====================

  insertTransaction(input: unknown): Transaction {
    const data = validateInput(TransactionCreate, input);
    return this.write(() => txOps.insertTransaction(this.db, data));
  }

  /**
   * Insert a batch; nothing is stored if any row fails validation or a constraint
   */
  insertTransactions(inputs: unknown): Transaction[] {
    const data = validateInput(TransactionCreateList, inputs);
    return this.write(() => txOps.insertTransactions(this.db, data));
  }

  getTransaction(id: number): Transaction | null {
    return txOps.getTransaction(this.db, validateInput(RecordId, id));
  }

  listTransactionsByJob(jobId: number, options?: unknown): Transaction[] {
    return txOps.listTransactionsByJob(
      this.db,
      validateInput(RecordId, jobId),
      validateInput(PaginationInput, options ?? {})
    );
  }

  filterTransactions(filter: unknown): Transaction[] {
    return txOps.filterTransactions(this.db, validateInput(TransactionFilter, filter));
  }

  countTransactionsByJob(jobId: number): number {
    return txOps.countTransactionsByJob(this.db, validateInput(RecordId, jobId));
  }

  updateTransaction(id: number, updates: unknown): Transaction {
    const validId = validateInput(RecordId, id);
    const data = validateInput(TransactionUpdate, updates);
    return this.write(() => txOps.updateTransaction(this.db, validId, data));
  }

  deleteTransaction(id: number): boolean {
    const validId = validateInput(RecordId, id);
    return this.write(() => txOps.deleteTransaction(this.db, validId));
  }

  // ==================== EXPORT RECORD OPERATIONS ====================

  insertExportRecord(input: unknown): ExportRecord {
    const data = validateInput(ExportRecordCreate, input);
    return this.write(() => exportOps.insertExportRecord(this.db, data));
  }

  getExportRecord(id: number): ExportRecord | null {
    return exportOps.getExportRecord(this.db, validateInput(RecordId, id));
  }

  listExportRecordsByJob(jobId: number): ExportRecord[] {
    return exportOps.listExportRecordsByJob(this.db, validateInput(RecordId, jobId));
  }

  incrementDownloadCount(id: number): number {
    const validId = validateInput(RecordId, id);
    return this.write(() => exportOps.incrementDownloadCount(this.db, validId));
  }

  deleteExportRecord(id: number): boolean {
    const validId = validateInput(RecordId, id);
    return this.write(() => exportOps.deleteExportRecord(this.db, validId));
  }

  // ==================== AGGREGATES ====================

  getExtractionSummary(jobId: number): ExtractionSummary {
    return getExtractionSummary(this.db, validateInput(RecordId, jobId));
  }

  getProcessingStatistics(): ProcessingStatistics {
    return getProcessingStatistics(this.db);
  }
}
