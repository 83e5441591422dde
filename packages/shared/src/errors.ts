/**
 * Service Errors
 *
 * Every failure the extract API reports to a caller is one of these. Each
 * carries the ErrorEnvelope code and the HTTP status it maps to.
 */

import type { ErrorEnvelope } from './types';

export type ErrorCode =
  | 'invalid_request'
  | 'payload_too_large'
  | 'no_extractable_text'
  | 'ocr_failed'
  | 'timeout'
  | 'internal_error';

export class ServiceError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/**
 * The upload is not something we can read: wrong content type, not a PDF,
 * empty body.
 */
export class InvalidDocumentError extends ServiceError {
  constructor(message: string) {
    super('invalid_request', 400, message);
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(limitBytes: number) {
    super('payload_too_large', 413, `Upload exceeds the ${limitBytes} byte limit`);
  }
}

/**
 * Neither the embedded text layer nor OCR produced any text for the document.
 */
export class UnrecoverableInputError extends ServiceError {
  constructor(message = 'Could not extract text from the document') {
    super('no_extractable_text', 422, message);
  }
}

/**
 * The OCR toolchain (pdftoppm, tesseract) is missing or failed.
 */
export class OcrEngineError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ocr_failed', 500, message, options);
  }
}

export class RequestTimeoutError extends ServiceError {
  constructor(timeoutMs: number) {
    super('timeout', 504, `Extraction did not finish within ${timeoutMs}ms`);
  }
}

/**
 * Map any thrown value to an HTTP status and ErrorEnvelope.
 * Unknown errors become a 500 without leaking their message.
 */
export function toErrorEnvelope(
  error: unknown,
  correlationId: string
): { status: number; body: ErrorEnvelope } {
  if (error instanceof ServiceError) {
    return {
      status: error.status,
      body: { error: { code: error.code, message: error.message, correlation_id: correlationId } },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: 'internal_error',
        message: 'Error during extraction',
        correlation_id: correlationId,
      },
    },
  };
}
