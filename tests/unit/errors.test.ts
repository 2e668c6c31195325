/**
 * AppError mapping and response formatting tests
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  ERROR_CATEGORIES,
  formatErrorResponse,
  getHint,
  type ErrorCategory,
} from '../../src/errors.js';
import { DatabaseError, DatabaseErrorCode } from '../../src/services/storage/database/types.js';
import { MigrationError } from '../../src/services/storage/migrations/types.js';
import { ValidationError } from '../../src/utils/validation.js';

describe('AppError.fromUnknown()', () => {
  it('returns an AppError unchanged', () => {
    const original = new AppError('RECORD_NOT_FOUND', 'Transaction 5 not found');
    expect(AppError.fromUnknown(original)).toBe(original);
  });

  it('maps ValidationError with its issues', () => {
    const error = AppError.fromUnknown(
      ValidationError.fromIssues([{ field: 'amount', reason: 'Invalid decimal amount "x"' }])
    );

    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('amount: Invalid decimal amount "x"');
    expect(error.details).toEqual({
      issues: [{ field: 'amount', reason: 'Invalid decimal amount "x"' }],
    });
  });

  const codeCases: Array<[DatabaseErrorCode, ErrorCategory]> = [
    [DatabaseErrorCode.DATABASE_NOT_FOUND, 'DATABASE_NOT_FOUND'],
    [DatabaseErrorCode.RECORD_NOT_FOUND, 'RECORD_NOT_FOUND'],
    [DatabaseErrorCode.FOREIGN_KEY_VIOLATION, 'FOREIGN_KEY_VIOLATION'],
    [DatabaseErrorCode.CONSTRAINT_VIOLATION, 'CONSTRAINT_VIOLATION'],
    [DatabaseErrorCode.INVALID_STATUS_TRANSITION, 'INVALID_STATUS_TRANSITION'],
    [DatabaseErrorCode.SCHEMA_MISMATCH, 'SCHEMA_ERROR'],
    [DatabaseErrorCode.INVALID_NAME, 'VALIDATION_ERROR'],
    [DatabaseErrorCode.DATABASE_LOCKED, 'INTERNAL_ERROR'],
  ];

  it.each(codeCases)('maps DatabaseError %s to %s', (code, category) => {
    expect(AppError.fromUnknown(new DatabaseError('failed', code)).category).toBe(category);
  });

  it('keeps the database error code and field in details', () => {
    const error = AppError.fromUnknown(
      new DatabaseError(
        'Foreign key violation',
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        undefined,
        'extraction_job_id'
      )
    );
    expect(error.details).toEqual({
      errorCode: 'FOREIGN_KEY_VIOLATION',
      field: 'extraction_job_id',
    });
  });

  it('maps MigrationError to SCHEMA_ERROR', () => {
    const error = AppError.fromUnknown(new MigrationError('too new', 'version_check'));
    expect(error.category).toBe('SCHEMA_ERROR');
    expect(error.details).toEqual({ operation: 'version_check' });
  });

  it('uses the default category for plain errors and non-errors', () => {
    expect(AppError.fromUnknown(new Error('boom')).category).toBe('INTERNAL_ERROR');
    expect(AppError.fromUnknown('boom', 'CONFIGURATION_ERROR')).toMatchObject({
      category: 'CONFIGURATION_ERROR',
      message: 'boom',
    });
  });
});

describe('formatErrorResponse()', () => {
  it('includes category, message, hint and details', () => {
    const response = formatErrorResponse(
      new AppError('RECORD_NOT_FOUND', 'Export record 9 not found', { entity: 'Export record', id: 9 })
    );

    expect(response).toEqual({
      success: false,
      error: {
        category: 'RECORD_NOT_FOUND',
        message: 'Export record 9 not found',
        hint: getHint('RECORD_NOT_FOUND'),
        details: { entity: 'Export record', id: 9 },
      },
    });
  });

  it('omits details when there are none', () => {
    const response = formatErrorResponse(new AppError('INTERNAL_ERROR', 'boom'));
    expect('details' in response.error).toBe(false);
  });

  it('has a hint for every category', () => {
    for (const category of ERROR_CATEGORIES) {
      expect(getHint(category).length).toBeGreaterThan(0);
    }
  });
});
