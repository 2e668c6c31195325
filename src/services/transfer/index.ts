export {
  DEFAULT_UPLOAD_MESSAGE,
  buildDownloadUrl,
  toExportResponse,
  toExtractionJobResponse,
  toFileUploadResponse,
  toTransactionResponse,
} from './responses.js';
