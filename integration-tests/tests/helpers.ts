/**
 * Shared test fixtures
 */

import { CONTRACT_RULES } from '@contract-ocr/shared';
import type { DocumentInfo, ExtractionRule, FieldName } from '@contract-ocr/shared';

/** The minimal contract every layer is checked against */
export const MINIMAL_CONTRACT_TEXT =
  'Customer: Jane Doe\n' +
  'Phone: (555) 123-4567\n' +
  'IMEI: 359201123456789\n' +
  'Plan: Gold Unlimited  $49.99\n' +
  'Order #: A-00231\n' +
  'Contract Date: 01/15/2024';

/** A full agreement laid out the way store-printed contracts are */
export const SERVICE_AGREEMENT_TEXT = `WIRELESS SERVICE AGREEMENT
Order Number: 151687471 Store: Main St Kiosk
Activity: New Activation
YOUR INFORMATION:
Customer Name: Jane Doe
Phone Number: (780) 617-4431 Default Voicemail Password: 1234
Store Phone Number: (780) 555-0100
Address: 12 Elm Street
Springfield AB T5T 1A1
Email: jane.doe@example.com
YOUR DEVICE DETAILS:
Model: Galaxy S24 Early Cancellation Fee(s): $0.00
IMEI/ESN/MEID: 359201123456789
SIM Number: 8912230000123456789
Start Date: November 19, 2025 End Date: November 18, 2027
YOUR RATE PLAN:
Plan: Gold Unlimited Monthly Rate Plan Charge: $49.99
Minimum Monthly Charge (for device and rate plan): $65.00`;

export function docInfo(overrides: Partial<DocumentInfo> = {}): DocumentInfo {
  return {
    document_id: '01HZTESTDOCUMENT0000000000',
    source_filename: 'contract.pdf',
    byte_size: 1024,
    ...overrides,
  };
}

export function ruleFor(field: FieldName): ExtractionRule {
  const rule = CONTRACT_RULES.find((r) => r.field === field);
  if (!rule) {
    throw new Error(`No contract rule for ${field}`);
  }
  return rule;
}

/** Bytes that pass the upload checks; the fake text sources never parse them */
export const PDF_BYTES = Buffer.from('%PDF-1.4\n1 0 obj\n<< /Type /Catalog >>\nendobj\n%%EOF\n');
