/**
 * Field Transform Tests
 */

import {
  cleanText,
  digitRange,
  phoneDigits,
  parseMoney,
  parseDate,
  orderNumber,
  planName,
  isCanonicalDate,
} from '@contract-ocr/shared';

describe('cleanText', () => {
  it('should collapse whitespace and trim separator noise', () => {
    expect(cleanText('  : Jane   Doe ,')).toBe('Jane Doe');
  });

  it('should return null when nothing is left', () => {
    expect(cleanText('  -- ')).toBeNull();
  });
});

describe('digit fields', () => {
  const imei = digitRange(13, 17);

  it('should strip separators from an IMEI', () => {
    expect(imei('35-9201-123456-7')).toBe('3592011234567');
    expect(imei('35 920112 345678 9')).toBe('359201123456789');
  });

  it('should reject digit runs outside the accepted length', () => {
    expect(imei('12345')).toBeNull();
    expect(imei('1234567890123456789')).toBeNull();
  });

  it('should keep the last 10 digits of a phone number', () => {
    expect(phoneDigits('(555) 123-4567')).toBe('5551234567');
    expect(phoneDigits('+1 (555) 123-4567')).toBe('5551234567');
  });

  it('should reject short phone numbers', () => {
    expect(phoneDigits('555-1234')).toBeNull();
  });
});

describe('parseMoney', () => {
  it('should parse dollar amounts with thousands separators', () => {
    expect(parseMoney('$1,234.50')).toBe(1234.5);
    expect(parseMoney('$49.99')).toBe(49.99);
    expect(parseMoney('65')).toBe(65);
  });

  it('should keep at most two decimals', () => {
    expect(parseMoney('49.999')).toBe(49.99);
  });

  it('should return null without an amount', () => {
    expect(parseMoney('USD')).toBeNull();
  });
});

describe('orderNumber', () => {
  it('should keep letters and dashes', () => {
    expect(orderNumber('A-00231')).toBe('A-00231');
    expect(orderNumber('151687471')).toBe('151687471');
  });

  it('should reject values without a digit', () => {
    expect(orderNumber('Pending')).toBeNull();
  });
});

describe('planName', () => {
  it('should cut the plan name before its price', () => {
    expect(planName('Gold Unlimited $49.99')).toBe('Gold Unlimited');
  });

  it('should cut the plan name before a merged charge label', () => {
    expect(planName('Gold Unlimited Monthly Rate Plan Charge: $49.99')).toBe('Gold Unlimited');
  });

  it('should return null when only a price is present', () => {
    expect(planName('$49.99')).toBeNull();
  });
});

describe('parseDate', () => {
  it('should canonicalize the same day written three ways', () => {
    expect(parseDate('12/03/2024')).toBe('2024-03-12');
    expect(parseDate('March 12, 2024')).toBe('2024-03-12');
    expect(parseDate('2024-03-12')).toBe('2024-03-12');
  });

  it('should read numeric dates day first by default', () => {
    expect(parseDate('03/04/2024')).toBe('2024-04-03');
  });

  it('should read numeric dates month first when configured', () => {
    expect(parseDate('03/04/2024', 'mdy')).toBe('2024-03-04');
    expect(parseDate('12/03/2024', 'mdy')).toBe('2024-12-03');
  });

  it('should fall back to the other order when the first is not a real date', () => {
    expect(parseDate('01/15/2024')).toBe('2024-01-15');
    expect(parseDate('15/01/2024', 'mdy')).toBe('2024-01-15');
  });

  it('should parse textual months', () => {
    expect(parseDate('November 19, 2025')).toBe('2025-11-19');
    expect(parseDate('Mar. 12, 2024')).toBe('2024-03-12');
    expect(parseDate('12 March 2024')).toBe('2024-03-12');
    expect(parseDate('2024.03.12')).toBe('2024-03-12');
  });

  it('should reject impossible dates', () => {
    expect(parseDate('31/02/2024')).toBeNull();
    expect(parseDate('2024-02-30')).toBeNull();
  });

  it('should return null for text that is not a date', () => {
    expect(parseDate('not a date')).toBeNull();
    expect(parseDate('')).toBeNull();
  });
});

describe('isCanonicalDate', () => {
  it('should accept real dates in YYYY-MM-DD form only', () => {
    expect(isCanonicalDate('2024-02-29')).toBe(true);
    expect(isCanonicalDate('2023-02-29')).toBe(false);
    expect(isCanonicalDate('2024-2-9')).toBe(false);
  });
});
