/**
 * statement-store
 *
 * Persistent data model for credit-card statement extraction: uploaded PDFs,
 * extraction jobs, extracted transactions and generated exports, stored in
 * SQLite through better-sqlite3.
 *
 * @module index
 */

export * from './models/index.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  MigrationError,
  verifySchema,
  type DatabaseInfo,
  type PaginationOptions,
  type RecordCounts,
  type SchemaVerificationResult,
} from './services/storage/index.js';

export {
  DEFAULT_UPLOAD_MESSAGE,
  buildDownloadUrl,
  toExportResponse,
  toExtractionJobResponse,
  toFileUploadResponse,
  toTransactionResponse,
} from './services/transfer/index.js';

export {
  ValidationError,
  validateInput,
  TransactionCreate,
  TransactionUpdate,
  TransactionFilter,
  ExtractionJobCreate,
  ExportRequest,
  ExportRecordCreate,
  UploadedFileCreate,
  IsoDate,
  IsoTimestamp,
  type ValidationIssue,
  type TransactionCreateInput,
  type TransactionUpdateInput,
  type TransactionFilterInput,
  type ExportRequestInput,
} from './utils/validation.js';

export { formatAmount, parseAmount, tryParseAmount, type AmountParseResult } from './utils/money.js';

export {
  AppError,
  formatErrorResponse,
  getHint,
  type ErrorCategory,
  type ErrorResponse,
} from './errors.js';

export { loadConfig, loadEnvFile, type AppConfig } from './config.js';
