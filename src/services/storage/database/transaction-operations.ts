/**
 * Transaction operations for DatabaseService
 *
 * Handles CRUD operations and filtered queries for the transactions table.
 * Amounts are stored and compared as integer cents.
 */

import type Database from 'better-sqlite3';
import type { Transaction } from '../../../models/transaction.js';
import type {
  TransactionCreate,
  TransactionFilter,
  TransactionUpdate,
} from '../../../utils/validation.js';
import { appendPagination, recordNotFound, runWithConstraintCheck } from './helpers.js';
import type { PaginationOptions } from './types.js';

/** Source order within a job: page, then line, then date; unknown locators sort last */
const SOURCE_ORDER =
  'ORDER BY page_number IS NULL, page_number, line_number IS NULL, line_number, transaction_date, id';

const INSERT_SQL = `
  INSERT INTO transactions (
    extraction_job_id, transaction_date, billing_date, description,
    amount_cents, raw_text, page_number, line_number
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  RETURNING *
`;

function insertRow(stmt: Database.Statement<unknown[], Transaction>, data: TransactionCreate): Transaction {
  const row = runWithConstraintCheck(
    'inserting transaction',
    () =>
      stmt.get(
        data.extraction_job_id,
        data.transaction_date,
        data.billing_date ?? null,
        data.description,
        data.amount_cents,
        data.raw_text ?? null,
        data.page_number ?? null,
        data.line_number ?? null
      ),
    'extraction_job_id'
  );
  if (!row) {
    throw new Error(`INSERT into transactions returned no row for job ${String(data.extraction_job_id)}`);
  }
  return row;
}

/**
 * Insert a transaction
 *
 * @throws DatabaseError FOREIGN_KEY_VIOLATION if the job does not exist
 */
export function insertTransaction(db: Database.Database, data: TransactionCreate): Transaction {
  return insertRow(db.prepare<unknown[], Transaction>(INSERT_SQL), data);
}

/**
 * Insert many transactions in one transaction; either all are stored or none
 */
export function insertTransactions(
  db: Database.Database,
  rows: TransactionCreate[]
): Transaction[] {
  const stmt = db.prepare<unknown[], Transaction>(INSERT_SQL);
  const insertAll = db.transaction((items: TransactionCreate[]) =>
    items.map((item) => insertRow(stmt, item))
  );
  return insertAll(rows);
}

/**
 * Get a transaction by ID
 */
export function getTransaction(db: Database.Database, id: number): Transaction | null {
  return db.prepare<[number], Transaction>('SELECT * FROM transactions WHERE id = ?').get(id) ?? null;
}

/**
 * List a job's transactions in source order
 */
export function listTransactionsByJob(
  db: Database.Database,
  jobId: number,
  options?: PaginationOptions
): Transaction[] {
  const params: unknown[] = [jobId];
  const query = appendPagination(
    `SELECT * FROM transactions WHERE extraction_job_id = ? ${SOURCE_ORDER}`,
    params,
    options
  );
  return db.prepare<unknown[], Transaction>(query).all(...params);
}

/**
 * Escape LIKE wildcards so the needle matches literally
 */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Query a job's transactions with AND-combined predicates, in source order
 */
export function filterTransactions(
  db: Database.Database,
  filter: TransactionFilter
): Transaction[] {
  const conditions: string[] = ['extraction_job_id = ?'];
  const params: unknown[] = [filter.extraction_job_id];

  if (filter.start_date !== undefined) {
    conditions.push('transaction_date >= ?');
    params.push(filter.start_date);
  }
  if (filter.end_date !== undefined) {
    conditions.push('transaction_date <= ?');
    params.push(filter.end_date);
  }
  if (filter.min_amount_cents !== undefined) {
    conditions.push('amount_cents >= ?');
    params.push(filter.min_amount_cents);
  }
  if (filter.max_amount_cents !== undefined) {
    conditions.push('amount_cents <= ?');
    params.push(filter.max_amount_cents);
  }
  if (filter.description_contains !== undefined) {
    conditions.push("description LIKE ? ESCAPE '\\'");
    params.push(`%${escapeLike(filter.description_contains)}%`);
  }
  if (filter.page_number !== undefined) {
    conditions.push('page_number = ?');
    params.push(filter.page_number);
  }

  const query = appendPagination(
    `SELECT * FROM transactions WHERE ${conditions.join(' AND ')} ${SOURCE_ORDER}`,
    params,
    filter
  );
  return db.prepare<unknown[], Transaction>(query).all(...params);
}

/**
 * Count the transactions stored for a job
 */
export function countTransactionsByJob(db: Database.Database, jobId: number): number {
  const row = db
    .prepare<[number], { count: number }>(
      'SELECT COUNT(*) as count FROM transactions WHERE extraction_job_id = ?'
    )
    .get(jobId);
  return row?.count ?? 0;
}

/**
 * Apply a partial update. Omitted fields are unchanged; an empty update
 * returns the current row.
 *
 * @throws DatabaseError RECORD_NOT_FOUND if the transaction does not exist
 */
export function updateTransaction(
  db: Database.Database,
  id: number,
  updates: TransactionUpdate
): Transaction {
  const sets: string[] = [];
  const params: unknown[] = [];

  if (updates.transaction_date !== undefined) {
    sets.push('transaction_date = ?');
    params.push(updates.transaction_date);
  }
  if (updates.billing_date !== undefined) {
    sets.push('billing_date = ?');
    params.push(updates.billing_date);
  }
  if (updates.description !== undefined) {
    sets.push('description = ?');
    params.push(updates.description);
  }
  if (updates.amount_cents !== undefined) {
    sets.push('amount_cents = ?');
    params.push(updates.amount_cents);
  }

  if (sets.length === 0) {
    const current = getTransaction(db, id);
    if (!current) throw recordNotFound('Transaction', id);
    return current;
  }

  params.push(id);
  const row = runWithConstraintCheck('updating transaction', () =>
    db
      .prepare<unknown[], Transaction>(
        `UPDATE transactions SET ${sets.join(', ')} WHERE id = ? RETURNING *`
      )
      .get(...params)
  );
  if (!row) throw recordNotFound('Transaction', id);
  return row;
}

/**
 * Delete a transaction
 *
 * @returns true if a record was deleted
 */
export function deleteTransaction(db: Database.Database, id: number): boolean {
  return db.prepare('DELETE FROM transactions WHERE id = ?').run(id).changes > 0;
}
