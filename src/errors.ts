/**
 * Application Error Handling
 *
 * Every failure that reaches a caller boundary (CLI, API layer) is converted
 * to an AppError with a category, so callers can distinguish a bad input from
 * a missing row or a broken database file without parsing messages.
 *
 * @module errors
 */

import { DatabaseError, DatabaseErrorCode } from './services/storage/database/types.js';
import { MigrationError } from './services/storage/migrations/types.js';
import { ValidationError } from './utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export const ERROR_CATEGORIES = [
  // Validation errors
  'VALIDATION_ERROR',

  // Database file errors
  'DATABASE_NOT_FOUND',
  'DATABASE_ALREADY_EXISTS',

  // Record errors
  'RECORD_NOT_FOUND',
  'FOREIGN_KEY_VIOLATION',
  'CONSTRAINT_VIOLATION',
  'INVALID_STATUS_TRANSITION',

  // Schema errors
  'SCHEMA_ERROR',

  // Configuration errors
  'CONFIGURATION_ERROR',

  // Internal errors
  'INTERNAL_ERROR',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE ERROR CODE TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

const DATABASE_CODE_TO_CATEGORY: Record<DatabaseErrorCode, ErrorCategory> = {
  [DatabaseErrorCode.DATABASE_NOT_FOUND]: 'DATABASE_NOT_FOUND',
  [DatabaseErrorCode.DATABASE_ALREADY_EXISTS]: 'DATABASE_ALREADY_EXISTS',
  [DatabaseErrorCode.DATABASE_LOCKED]: 'INTERNAL_ERROR',
  [DatabaseErrorCode.RECORD_NOT_FOUND]: 'RECORD_NOT_FOUND',
  [DatabaseErrorCode.FOREIGN_KEY_VIOLATION]: 'FOREIGN_KEY_VIOLATION',
  [DatabaseErrorCode.CONSTRAINT_VIOLATION]: 'CONSTRAINT_VIOLATION',
  [DatabaseErrorCode.INVALID_STATUS_TRANSITION]: 'INVALID_STATUS_TRANSITION',
  [DatabaseErrorCode.SCHEMA_MISMATCH]: 'SCHEMA_ERROR',
  [DatabaseErrorCode.PERMISSION_DENIED]: 'INTERNAL_ERROR',
  [DatabaseErrorCode.INVALID_NAME]: 'VALIDATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// APP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * AppError - Structured error for every failure surfaced to a caller
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (error instanceof ValidationError) {
      return new AppError('VALIDATION_ERROR', error.message, { issues: error.issues });
    }

    if (error instanceof DatabaseError) {
      return new AppError(DATABASE_CODE_TO_CATEGORY[error.code], error.message, {
        errorCode: error.code,
        ...(error.field !== undefined && { field: error.field }),
      });
    }

    if (error instanceof MigrationError) {
      return new AppError('SCHEMA_ERROR', error.message, {
        operation: error.operation,
        ...(error.tableName !== undefined && { tableName: error.tableName }),
      });
    }

    if (error instanceof Error) {
      return new AppError(defaultCategory, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new AppError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HINTS
// ═══════════════════════════════════════════════════════════════════════════════

const HINTS: Record<ErrorCategory, string> = {
  VALIDATION_ERROR: 'Check field types, lengths and required fields listed in details.issues',
  DATABASE_NOT_FOUND: 'Run `statement-store list` to see available databases',
  DATABASE_ALREADY_EXISTS: 'Choose a unique database name',
  RECORD_NOT_FOUND: 'Check the record ID; it may have been deleted with its parent',
  FOREIGN_KEY_VIOLATION: 'Create the referenced upload or extraction job first',
  CONSTRAINT_VIOLATION: 'A stored value breaks a column constraint; validate input first',
  INVALID_STATUS_TRANSITION:
    'Jobs move pending -> processing -> completed, or to failed from pending or processing',
  SCHEMA_ERROR: 'Run `statement-store verify` on the database; it may be newer than this build',
  CONFIGURATION_ERROR: 'Check STATEMENT_STORE_* environment variables and the .env file',
  INTERNAL_ERROR: 'Unexpected failure; see details for the original error',
};

/**
 * Get the hint for an error category
 */
export function getHint(category: ErrorCategory): string {
  return HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    hint: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Format an AppError for an API or CLI response
 */
export function formatErrorResponse(error: AppError): ErrorResponse {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      hint: HINTS[error.category],
      ...(error.details !== undefined && { details: error.details }),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError('VALIDATION_ERROR', message, details);
}

/**
 * Create configuration error for invalid environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError('CONFIGURATION_ERROR', message, details);
}
