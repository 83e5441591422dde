/**
 * Prometheus Metrics
 *
 * Metrics for HTTP traffic, document processing, and per-field match rates.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'contract_ocr_documents_processed_total',
  help: 'Total number of documents processed',
  labelNames: ['text_source', 'status'],
  registers: [register],
});

export const textAcquisitionDurationHistogram = new promClient.Histogram({
  name: 'contract_ocr_text_acquisition_duration_seconds',
  help: 'Duration of reading text from a PDF (text layer or OCR)',
  labelNames: ['text_source'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'contract_ocr_extraction_duration_seconds',
  help: 'Duration of field extraction over recognized text',
  labelNames: ['document_type'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

export const fieldMatchesCounter = new promClient.Counter({
  name: 'contract_ocr_field_matches_total',
  help: 'Field extraction outcomes by field and winning strategy',
  labelNames: ['field', 'strategy'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'contract_ocr_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 120],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'contract_ocr_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
