/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

/**
 * How an all-numeric date such as 03/04/2024 is read.
 * 'dmy' tries day/month first and falls back to month/day when that is not a
 * real date; 'mdy' does the reverse.
 */
export type DateOrder = 'dmy' | 'mdy';

export interface Config {
  // HTTP
  port: number;
  serviceName: string;
  maxUploadBytes: number;
  requestTimeoutMs: number;

  // OCR engine
  tesseractCmd: string;
  pdftoppmCmd: string;
  ocrLanguage: string;
  ocrDpi: number;
  ocrPsm: number;
  ocrOem: number;

  // Text source selection
  minEmbeddedTextChars: number;

  // Field extraction
  dateOrder: DateOrder;
}

function parseDateOrder(value: string | undefined): DateOrder {
  return value === 'mdy' ? 'mdy' : 'dmy';
}

export const config: Config = {
  // HTTP
  port: parseInt(process.env.PORT || '8000', 10),
  serviceName: process.env.SERVICE_NAME || 'extract-api',
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(20 * 1024 * 1024), 10),
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || '120000', 10),

  // OCR engine
  tesseractCmd: process.env.TESSERACT_CMD || 'tesseract',
  pdftoppmCmd: process.env.PDFTOPPM_CMD || 'pdftoppm',
  ocrLanguage: process.env.OCR_LANGUAGE || 'eng',
  ocrDpi: parseInt(process.env.OCR_DPI || '300', 10),
  ocrPsm: parseInt(process.env.OCR_PSM || '6', 10),
  ocrOem: parseInt(process.env.OCR_OEM || '3', 10),

  // Text source selection
  minEmbeddedTextChars: parseInt(process.env.MIN_EMBEDDED_TEXT_CHARS || '40', 10),

  // Field extraction
  dateOrder: parseDateOrder(process.env.DATE_ORDER),
};
