/**
 * UploadedFile interface for stored statement PDFs
 *
 * Root of the data chain: one upload owns zero or more extraction jobs.
 * Immutable after insert.
 */
export interface UploadedFile {
  /** Integer primary key */
  id: number;

  /** Original filename of the uploaded PDF (max 255 chars) */
  filename: string;

  /** Server path to the stored file (max 500 chars) */
  file_path: string;

  /** File size in bytes */
  file_size: number;

  /** MIME type of the upload (max 100 chars) */
  content_type: string;

  /** ISO 8601 timestamp of the upload */
  upload_date: string;
}

