/**
 * Field Transforms
 *
 * Post-processing applied to matched text: digit normalization, money and
 * date parsing, free-text cleanup. Each returns null when the matched text
 * does not hold a usable value, which sends the rule on to its next candidate.
 */

import { format, isValid, parse } from 'date-fns';
import type { DateOrder } from '../config';
import type { Transform } from './types';

/**
 * Collapse whitespace and trim separator noise from both ends.
 */
export function cleanText(raw: string): string | null {
  const text = raw
    .replace(/\s+/g, ' ')
    .replace(/^[\s:;|,-]+|[\s:;|,-]+$/g, '');
  return text.length > 0 ? text : null;
}

export function digitsOnly(raw: string): string {
  return raw.replace(/\D/g, '');
}

/**
 * Strip separators, accept the value when the digit count is within bounds.
 */
export function digitRange(min: number, max: number): Transform {
  return (raw) => {
    const digits = digitsOnly(raw);
    return digits.length >= min && digits.length <= max ? digits : null;
  };
}

/**
 * 10-digit phone number. A leading country code added by OCR or the form is dropped.
 */
export function phoneDigits(raw: string): string | null {
  const digits = digitsOnly(raw);
  return digits.length >= 10 ? digits.slice(-10) : null;
}

/**
 * "$1,234.50" -> 1234.5
 */
export function parseMoney(raw: string): number | null {
  const match = raw.replace(/,/g, '').match(/\d+(?:\.\d{1,2})?/);
  if (!match) return null;

  const amount = parseFloat(match[0]);
  return Number.isFinite(amount) ? amount : null;
}

/**
 * Order numbers keep letters and dashes ("A-00231") but must carry a digit.
 */
export function orderNumber(raw: string): string | null {
  const value = cleanText(raw);
  return value && /\d/.test(value) ? value : null;
}

/**
 * Plan line text up to the first money amount or charge label.
 * "Gold Unlimited $49.99" -> "Gold Unlimited"
 */
export function planName(raw: string): string | null {
  const [name] = raw.split(
    /\s*(?:Monthly\s+Rate\s+Plan\s+Charge|Minimum\s+Monthly\s+Charge|Plan\s+Charge)\s*:|\s*\$\s*\d/i
  );
  return cleanText(name);
}

// ============================================================================
// Dates
// ============================================================================

const CANONICAL_DATE = 'yyyy-MM-dd';
const REFERENCE_DATE = new Date(2000, 0, 1);

const ISO_NUMERIC = /^\d{4}[-/.]\d{1,2}[-/.]\d{1,2}$/;
const SHORT_NUMERIC = /^\d{1,2}[-/.]\d{1,2}[-/.]\d{4}$/;

const TEXTUAL_FORMATS = ['MMMM d yyyy', 'MMM d yyyy', 'd MMMM yyyy', 'd MMM yyyy'];

function withoutLeadingZeros(value: string): string {
  return value.replace(/\b0+(\d)/g, '$1').toLowerCase();
}

function candidates(raw: string, order: DateOrder): { input: string; formats: string[] } {
  if (ISO_NUMERIC.test(raw)) {
    return { input: raw.replace(/[/.]/g, '-'), formats: ['yyyy-M-d'] };
  }
  if (SHORT_NUMERIC.test(raw)) {
    const formats = order === 'dmy' ? ['d/M/yyyy', 'M/d/yyyy'] : ['M/d/yyyy', 'd/M/yyyy'];
    return { input: raw.replace(/[-.]/g, '/'), formats };
  }
  return {
    input: raw.replace(/[.,]/g, ' ').replace(/\s+/g, ' ').trim(),
    formats: TEXTUAL_FORMATS,
  };
}

/**
 * Parse a date in any of the supported source formats into YYYY-MM-DD.
 *
 * Numeric day/month dates are ambiguous; `order` decides which reading is
 * tried first, the other is used when the first is not a real calendar date.
 * Returns null when nothing parses.
 */
export function parseDate(raw: string, order: DateOrder = 'dmy'): string | null {
  const text = raw.replace(/\s+/g, ' ').replace(/[;|]+$/, '').trim();
  if (!text) return null;

  const { input, formats } = candidates(text, order);
  for (const pattern of formats) {
    const date = parse(input, pattern, REFERENCE_DATE);
    // Round-trip check rejects rollovers such as 31/02
    if (isValid(date) && withoutLeadingZeros(format(date, pattern)) === withoutLeadingZeros(input)) {
      return format(date, CANONICAL_DATE);
    }
  }

  return null;
}

export function dateTransform(order: DateOrder): Transform {
  return (raw) => parseDate(raw, order);
}

/**
 * True for a real calendar date written as YYYY-MM-DD.
 */
export function isCanonicalDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const date = parse(value, CANONICAL_DATE, REFERENCE_DATE);
  return isValid(date) && format(date, CANONICAL_DATE) === value;
}
