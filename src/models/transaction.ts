/**
 * Transaction interface for extracted statement line items
 */

export interface Transaction {
  id: number;

  /** Parent extraction job */
  extraction_job_id: number;

  /** Date the purchase happened (YYYY-MM-DD) */
  transaction_date: string;

  /** Date the charge was posted to the statement (YYYY-MM-DD) */
  billing_date: string | null;

  /** Merchant / line description (max 500 chars) */
  description: string;

  /**
   * Amount in integer cents. Rendered as a two-decimal string at the API
   * boundary; never held as a fractional number.
   */
  amount_cents: number;

  /** Original PDF text the row was parsed from (max 1000 chars) */
  raw_text: string | null;

  /** 1-based PDF page where the row was found */
  page_number: number | null;

  /** Line number on the page */
  line_number: number | null;

  /** ISO 8601 timestamp when the row was stored */
  created_at: string;
}
