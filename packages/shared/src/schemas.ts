/**
 * JSON Schema Validation
 *
 * Validates extraction records against docs/contracts/extraction_record.schema.json
 * using Ajv.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

const RECORD_SCHEMA_FILE = 'extraction_record.schema.json';

let recordSchema: object | null = null;
let recordValidator: ValidateFunction | null = null;

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // packages/shared/src in development and tests
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // dist/packages/shared/src after build
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Project root (containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) continue;

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (isObject(parsed)) return parsed;
      logger.warn('Schema file is not a JSON object', { schemaPath });
    } catch (error) {
      logger.warn('Schema file could not be read', {
        schemaPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Permissive fallback keeps the API serving if the contracts dir is missing
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getRecordSchema(): object {
  if (!recordSchema) {
    recordSchema = loadSchema(RECORD_SCHEMA_FILE);
  }
  return recordSchema;
}

function getRecordValidator(): ValidateFunction {
  if (!recordValidator) {
    recordValidator = ajv.compile(getRecordSchema());
  }
  return recordValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate an ExtractionRecord against extraction_record.schema.json
 */
export function validateRecord(data: unknown): ValidationResult {
  const validate = getRecordValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    return { valid: false, errors };
  }

  return { valid: true };
}
