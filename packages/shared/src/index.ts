/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type DateOrder } from './config';

// Types
export * from './types';

// Errors
export {
  ServiceError,
  InvalidDocumentError,
  PayloadTooLargeError,
  UnrecoverableInputError,
  OcrEngineError,
  RequestTimeoutError,
  toErrorEnvelope,
  type ErrorCode,
} from './errors';

// Metrics
export {
  documentsProcessedCounter,
  textAcquisitionDurationHistogram,
  extractionDurationHistogram,
  fieldMatchesCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateRecord, type ValidationResult } from './schemas';

// Field extraction
export * from './extractors';
