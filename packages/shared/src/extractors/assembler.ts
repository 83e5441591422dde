/**
 * Record Assembler
 *
 * Runs every rule of a rule set over normalized text and builds the
 * fixed-schema ExtractionRecord. Rules are independent: one rule's outcome
 * never decides whether another runs. A matched value that fails its field's
 * type check is downgraded to null with a warning instead of failing the record.
 */

import type { ExtractionRecord, FieldName } from '../types';
import { FIELD_NAMES } from '../types';
import { runRule } from './rules';
import { isCanonicalDate } from './transforms';
import type { FieldResult, RuleSet } from './types';

export interface AssembledRecord {
  record: Readonly<ExtractionRecord>;
  /** Outcome per schema field, including fields the rule set has no rule for */
  fields: ReadonlyMap<FieldName, FieldResult>;
  warnings: string[];
}

/**
 * Run each rule once. Fields without a rule are reported as `no_rule`.
 */
export function runRules(text: string, rules: RuleSet): Map<FieldName, FieldResult> {
  const results = new Map<FieldName, FieldResult>();
  for (const field of FIELD_NAMES) {
    results.set(field, { found: false, reason: 'no_rule' });
  }
  for (const rule of rules) {
    results.set(rule.field, runRule(rule, text));
  }
  return results;
}

/**
 * Assemble the record for one document's normalized text.
 * Never throws; empty text gives a record with every field null.
 */
export function assembleRecord(text: string, rules: RuleSet): AssembledRecord {
  const fields = runRules(text, rules);
  const warnings: string[] = [];

  function accept<T>(field: FieldName, check: (value: unknown) => value is T): T | null {
    const result = fields.get(field);
    if (!result || !result.found) return null;
    if (check(result.value)) return result.value;

    warnings.push(`${field}: matched value "${result.raw}" is not a valid ${field}, set to null`);
    fields.set(field, { found: false, reason: 'invalid_value' });
    return null;
  }

  const textField = (field: FieldName) => accept(field, isText);
  const digitsField = (field: FieldName) => accept(field, isDigits);
  const decimalField = (field: FieldName) => accept(field, isDecimal);
  const dateField = (field: FieldName) => accept(field, isDate);

  const record: ExtractionRecord = {
    customer_name: textField('customer_name'),
    phone: digitsField('phone'),
    address: textField('address'),
    device_model: textField('device_model'),
    imei: digitsField('imei'),
    sim_number: digitsField('sim_number'),
    plan_name: textField('plan_name'),
    plan_charge: decimalField('plan_charge'),
    contract_date: dateField('contract_date'),
    order_number: textField('order_number'),
    contract_end_date: dateField('contract_end_date'),
    minimum_monthly_charge: decimalField('minimum_monthly_charge'),
    activity: textField('activity'),
  };

  return { record: Object.freeze(record), fields, warnings };
}

function isText(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isDigits(value: unknown): value is string {
  return typeof value === 'string' && /^\d+$/.test(value);
}

function isDecimal(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isDate(value: unknown): value is string {
  return typeof value === 'string' && isCanonicalDate(value);
}

/**
 * Fields that ended up with a value, in schema order.
 */
export function matchedFields(record: Readonly<ExtractionRecord>): FieldName[] {
  return FIELD_NAMES.filter((field) => record[field] !== null);
}
