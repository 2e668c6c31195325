/**
 * Row conversion functions for DatabaseService
 *
 * Converts database row objects to domain model interfaces. Enum columns are
 * checked against their closed value sets so a hand-edited row surfaces as an
 * error instead of an out-of-range value.
 */

import { JOB_STATUSES, type ExtractionJob, type JobStatus } from '../../../models/extraction-job.js';
import { FILE_FORMATS, type ExportRecord, type FileFormat } from '../../../models/export-record.js';
import type { JsonObject } from '../../../models/json.js';
import { JsonObjectSchema } from '../../../utils/validation.js';
import { DatabaseError, DatabaseErrorCode, type ExtractionJobRow, type ExportRecordRow } from './types.js';

function isMember<T extends string>(value: string, validValues: readonly T[]): value is T {
  return validValues.some((valid) => valid === value);
}

/**
 * Validate that a string value is a member of an enum/union type at runtime.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: number
): T {
  if (!isMember(value, validValues)) {
    throw new DatabaseError(
      `Invalid ${fieldName} "${value}" in record ${String(id)}. Valid values: ${validValues.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH,
      undefined,
      fieldName
    );
  }
  return value;
}

function parseMetadata(id: number, raw: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new DatabaseError(
      `Corrupt extraction_metadata in extraction job ${String(id)}`,
      DatabaseErrorCode.SCHEMA_MISMATCH,
      error,
      'extraction_metadata'
    );
  }
  const result = JsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new DatabaseError(
      `extraction_metadata in extraction job ${String(id)} is not a JSON object`,
      DatabaseErrorCode.SCHEMA_MISMATCH,
      result.error,
      'extraction_metadata'
    );
  }
  return result.data;
}

export function rowToExtractionJob(row: ExtractionJobRow): ExtractionJob {
  const status: JobStatus = validateEnum(row.status, JOB_STATUSES, 'status', row.id);
  return {
    id: row.id,
    uploaded_file_id: row.uploaded_file_id,
    status,
    started_at: row.started_at,
    completed_at: row.completed_at,
    error_message: row.error_message,
    total_transactions_found: row.total_transactions_found,
    extraction_metadata: parseMetadata(row.id, row.extraction_metadata),
  };
}

export function rowToExportRecord(row: ExportRecordRow): ExportRecord {
  const format: FileFormat = validateEnum(row.format, FILE_FORMATS, 'format', row.id);
  return {
    id: row.id,
    extraction_job_id: row.extraction_job_id,
    format,
    filename: row.filename,
    file_path: row.file_path,
    created_at: row.created_at,
    download_count: row.download_count,
  };
}
