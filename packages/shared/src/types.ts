/**
 * Shared Types
 *
 * Wire shapes of the extract API and the record produced by the contract
 * extractor. Field names are snake_case because they are the JSON contract
 * (see docs/contracts/extraction_record.schema.json).
 */

// ============================================================================
// Extraction Record
// ============================================================================

/**
 * Structured fields read from one contract. Every key is always present;
 * a field the document does not yield is null.
 */
export interface ExtractionRecord {
  customer_name: string | null;
  /** Digits only, 10 digits */
  phone: string | null;
  address: string | null;
  device_model: string | null;
  /** Digits only */
  imei: string | null;
  /** Digits only (ICCID) */
  sim_number: string | null;
  plan_name: string | null;
  plan_charge: number | null;
  /** YYYY-MM-DD */
  contract_date: string | null;
  order_number: string | null;
  /** YYYY-MM-DD */
  contract_end_date: string | null;
  minimum_monthly_charge: number | null;
  activity: string | null;
}

export type FieldName = keyof ExtractionRecord;

/**
 * Schema field order. JSON output follows this order regardless of the order
 * rules run in.
 */
export const FIELD_NAMES: readonly FieldName[] = Object.freeze([
  'customer_name',
  'phone',
  'address',
  'device_model',
  'imei',
  'sim_number',
  'plan_name',
  'plan_charge',
  'contract_date',
  'order_number',
  'contract_end_date',
  'minimum_monthly_charge',
  'activity',
]);

// ============================================================================
// Documents
// ============================================================================

export interface DocumentInfo {
  document_id: string;
  source_filename: string | null;
  byte_size: number;
}

/**
 * Text recognized on one page. Page numbers start at 1.
 */
export interface PageText {
  pageNumber: number;
  text: string;
}

/**
 * Where the text of a document came from
 */
export type TextSourceKind = 'text_layer' | 'ocr';

// ============================================================================
// API Types
// ============================================================================

export interface ExtractResponse {
  success: true;
  message: string;
  extraction: ExtractionRecord;
  metadata: {
    correlation_id: string;
    document_id: string;
    page_count: number;
    text_source: TextSourceKind;
    algorithm_version: string;
    duration_ms: number;
    matched_fields: FieldName[];
    warnings: string[];
  };
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface EngineHealth {
  tesseract: boolean;
  pdftoppm: boolean;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  service: string;
  ocr: EngineHealth;
  timestamp: string;
}
