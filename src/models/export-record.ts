/**
 * ExportRecord interface for generated Excel/CSV files
 */

/**
 * Supported export formats
 */
export const FILE_FORMATS = ['excel', 'csv'] as const;

export type FileFormat = (typeof FILE_FORMATS)[number];

export interface ExportRecord {
  id: number;
  extraction_job_id: number;
  format: FileFormat;

  /** Generated export filename (max 255 chars) */
  filename: string;

  /** Server path to the export file (max 500 chars) */
  file_path: string;

  created_at: string;

  /** Incremented on every download */
  download_count: number;
}

