/**
 * Statement Store - Zod Validation Schemas
 *
 * Input validation for every write and query shape. Each schema includes:
 * - Type validation
 * - Constraint validation (max lengths, NUMERIC(10, 2) amounts, enums, calendar dates)
 * - Descriptive error messages
 * - Default values where appropriate
 *
 * Amount fields are parsed into integer cents (`amount_cents`, `min_amount_cents`,
 * `max_amount_cents`) by the schemas themselves, so nothing downstream handles
 * decimal text.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { JOB_STATUSES } from '../models/extraction-job.js';
import { FILE_FORMATS } from '../models/export-record.js';
import type { JsonValue } from '../models/json.js';
import { tryParseAmount } from './money.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One failed constraint
 */
export interface ValidationIssue {
  /** Dotted path of the offending field, or "(root)" for whole-object checks */
  field: string;
  reason: string;
}

/**
 * Validation error carrying every failed field and its reason
 */
export class ValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromIssues(issues: ValidationIssue[]): ValidationError {
    const message = issues.map((i) => `${i.field}: ${i.reason}`).join('; ');
    return new ValidationError(message, issues);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated, defaulted and transformed data
 * @throws ValidationError listing each failed field
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromIssues(
      result.error.errors.map((e) => ({
        field: e.path.length > 0 ? e.path.join('.') : '(root)',
        reason: e.message,
      }))
    );
  }
  return result.data;
}

/**
 * String of at most `max` characters, counted as code points like SQLite's length()
 */
function boundedString(label: string, max: number) {
  return z
    .string()
    .refine((value) => [...value].length <= max, `${label} must be ${max} characters or less`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extraction job status enum
 */
export const JobStatusSchema = z.enum(JOB_STATUSES);

/**
 * Export file format enum
 */
export const FileFormatSchema = z.enum(FILE_FORMATS);

/**
 * Integer primary key reference
 */
export const RecordId = z.number().int('ID must be an integer').positive('ID must be positive');

/**
 * Calendar date in YYYY-MM-DD form
 */
export const IsoDate = z
  .string()
  .date('Must be a valid calendar date in YYYY-MM-DD format');

/**
 * ISO 8601 date-time with a `Z` or `±HH:MM` zone, normalized to UTC
 * toISOString form. Timestamps without a zone are rejected.
 */
export const IsoTimestamp = z
  .string()
  .datetime({ offset: true, message: 'Must be an ISO 8601 date-time with a zone (Z or +HH:MM)' })
  .transform((value, ctx) => {
    const ms = Date.parse(value);
    if (Number.isNaN(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable timestamp "${value}"` });
      return z.NEVER;
    }
    return new Date(ms).toISOString();
  });

/**
 * NUMERIC(10, 2) amount given as a decimal string or number; parses to cents
 */
export const AmountValue = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const result = tryParseAmount(value);
  if (!result.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.reason });
    return z.NEVER;
  }
  return result.cents;
});

/**
 * JSON-compatible value (null, boolean, finite number, string, array, object)
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * String-keyed metadata map
 */
export const JsonObjectSchema = z.record(JsonValueSchema);

/**
 * Limit/offset pagination
 */
export const PaginationInput = z.object({
  limit: z.number().int().min(1).max(10000).optional(),
  offset: z.number().int().min(0).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// UPLOADED FILE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for recording an uploaded PDF
 */
export const UploadedFileCreate = z.object({
  filename: boundedString('filename', 255),
  file_path: boundedString('file_path', 500),
  file_size: z.number().int('file_size must be an integer').nonnegative('file_size must be non-negative'),
  content_type: boundedString('content_type', 100),
  upload_date: IsoTimestamp.optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION JOB SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for creating an extraction job
 */
export const ExtractionJobCreate = z.object({
  uploaded_file_id: RecordId,
  extraction_metadata: JsonObjectSchema.optional(),
});

/**
 * Schema for listing extraction jobs
 */
export const ExtractionJobListInput = PaginationInput.extend({
  uploaded_file_id: RecordId.optional(),
  status: JobStatusSchema.optional(),
});

/**
 * Schema for the completion step of a job
 */
export const ExtractionJobCompleteInput = z.object({
  total_transactions_found: z
    .number()
    .int()
    .nonnegative('total_transactions_found must be non-negative')
    .optional(),
  completed_at: IsoTimestamp.optional(),
});

/**
 * Failure reason stored on a failed job
 */
export const ErrorMessageInput = boundedString('error_message', 1000);

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSACTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Page or line number as reported by the parser */
const Locator = z.number().int();

/**
 * Schema for creating a transaction
 */
export const TransactionCreate = z
  .object({
    extraction_job_id: RecordId,
    transaction_date: IsoDate,
    billing_date: IsoDate.nullable().optional(),
    description: boundedString('description', 500),
    amount: AmountValue,
    raw_text: boundedString('raw_text', 1000).nullable().optional(),
    page_number: Locator.nullable().optional(),
    line_number: Locator.nullable().optional(),
  })
  .transform(({ amount, ...rest }) => ({ ...rest, amount_cents: amount }));

/**
 * Schema for updating transaction data.
 *
 * Omitted fields are left unchanged; `billing_date: null` clears the billing date.
 */
export const TransactionUpdate = z
  .object({
    transaction_date: IsoDate.optional(),
    billing_date: IsoDate.nullable().optional(),
    description: boundedString('description', 500).optional(),
    amount: AmountValue.optional(),
  })
  .transform(({ amount, ...rest }) => ({
    ...rest,
    ...(amount !== undefined && { amount_cents: amount }),
  }));

/**
 * Schema for filtering transactions.
 *
 * Predicates are AND-combined; date and amount bounds are inclusive, so an
 * inverted range matches nothing.
 */
export const TransactionFilter = z
  .object({
    extraction_job_id: RecordId,
    start_date: IsoDate.optional(),
    end_date: IsoDate.optional(),
    min_amount: AmountValue.optional(),
    max_amount: AmountValue.optional(),
    description_contains: boundedString('description_contains', 500).optional(),
    page_number: Locator.optional(),
    limit: z.number().int().min(1).max(10000).optional(),
    offset: z.number().int().min(0).optional(),
  })
  .transform(({ min_amount, max_amount, ...rest }) => ({
    ...rest,
    ...(min_amount !== undefined && { min_amount_cents: min_amount }),
    ...(max_amount !== undefined && { max_amount_cents: max_amount }),
  }));

// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for export requests
 */
export const ExportRequest = z.object({
  extraction_job_id: RecordId,
  format: FileFormatSchema.default('excel'),
  include_metadata: z.boolean().default(false),
});

/**
 * Schema for recording a generated export file
 */
export const ExportRecordCreate = z.object({
  extraction_job_id: RecordId,
  format: FileFormatSchema,
  filename: boundedString('filename', 255),
  file_path: boundedString('file_path', 500),
});

// ═══════════════════════════════════════════════════════════════════════════════
// INFERRED TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type UploadedFileCreate = z.output<typeof UploadedFileCreate>;
export type ExtractionJobCreate = z.output<typeof ExtractionJobCreate>;
export type ExtractionJobListInput = z.output<typeof ExtractionJobListInput>;
export type TransactionCreateInput = z.input<typeof TransactionCreate>;
export type TransactionCreate = z.output<typeof TransactionCreate>;
export type TransactionUpdateInput = z.input<typeof TransactionUpdate>;
export type TransactionUpdate = z.output<typeof TransactionUpdate>;
export type TransactionFilterInput = z.input<typeof TransactionFilter>;
export type TransactionFilter = z.output<typeof TransactionFilter>;
export type ExportRequestInput = z.input<typeof ExportRequest>;
export type ExportRequest = z.output<typeof ExportRequest>;
export type ExportRecordCreate = z.output<typeof ExportRecordCreate>;
