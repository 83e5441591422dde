/**
 * Contract Extraction Patterns
 *
 * Rule table for wireless service contracts. Each field lists its labels in
 * priority order; where a value has a recognizable shape of its own (phone,
 * IMEI, ICCID, dates) a format matcher follows as the fallback for labels
 * OCR has garbled.
 *
 * Typical contract text after normalization:
 *
 *   YOUR INFORMATION:
 *   Customer Name: Jane Doe
 *   Phone Number: (780) 617-4431 Default Voicemail Password: 1234
 *   Address: 12 Elm Street
 *   Springfield AB T5T 1A1
 *   YOUR DEVICE DETAILS:
 *   Model: Galaxy S24 Early Cancellation Fee(s): $0.00
 *   IMEI/ESN/MEID: 359201123456789
 *   SIM Number: 8912230000123456789
 *   Start Date: November 19, 2025 End Date: November 18, 2027
 */

import { config, type DateOrder } from '../../config';
import { createRuleSet } from '../rules';
import {
  cleanText,
  dateTransform,
  digitRange,
  orderNumber,
  parseMoney,
  phoneDigits,
  planName,
} from '../transforms';
import type { ExtractionRuleSpec, RuleSet, SectionSpec } from '../types';

// ============================================================================
// Value shapes
// ============================================================================

/** Phone number beside its label, optional +1 */
export const PHONE_VALUE = /(?:\+?1[\s.-]*)?\(?\d{3}\)?[\s.-]*\d{3}[\s.-]*\d{4}/;

/**
 * Unlabelled phone number. Requires the usual separators so bare digit runs
 * (IMEIs, account numbers) are not read as phones.
 */
export const PHONE_FORMAT =
  /(?<![\d-])(?:\(\d{3}\)\s*\d{3}[\s.-]?\d{4}|\d{3}[.-]\d{3}[.-]\d{4})(?!\d)/;

/** Digits with the separators OCR and printed forms put between groups */
export const IMEI_VALUE = /\d[\d\s-]{10,24}\d/;

/** A standalone 15-digit run, read before the separated form */
export const IMEI_FORMAT = /(?<!\d)\d{15}(?!\d)/;

const IMEI_LABELS = ['IMEI/ESN/MEID', 'IMEI', 'MEID', 'ESN'];

export const SIM_VALUE = /\d[\d\s-]{16,30}\d/;

/** Unlabelled ICCID: telecom prefix 89, 19 or 20 digits */
export const SIM_FORMAT = /(?<!\d)89\d{17,18}(?!\d)/;

/** Money amount that must carry a dollar sign */
export const DOLLAR_AMOUNT = /\$\s*(\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?|\d+(?:\.\d{1,2})?)/;

/** Money amount, dollar sign optional */
export const MONEY_VALUE = /\$?\s*(\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?|\d+(?:\.\d{1,2})?)/;

const DATE_SHAPES =
  '\\d{4}[-/.]\\d{1,2}[-/.]\\d{1,2}' +
  '|\\d{1,2}[-/.]\\d{1,2}[-/.]\\d{4}' +
  '|[A-Za-z]{3,9}\\.?\\s+\\d{1,2},?\\s+\\d{4}' +
  '|\\d{1,2}\\s+[A-Za-z]{3,9}\\.?,?\\s+\\d{4}';

export const DATE_VALUE = new RegExp(`(${DATE_SHAPES})`);

export const DATE_FORMAT = new RegExp(`(?<![\\w/.-])(${DATE_SHAPES})(?![\\w/-])`);

/** Order numbers: alphanumeric groups joined by dashes ("A-00231", "151687471") */
export const ORDER_VALUE = /[A-Za-z0-9]+(?:-[A-Za-z0-9]+)*/;

// ============================================================================
// Layout
// ============================================================================

/** Customer details; the store's own contact block sits outside it */
export const INFORMATION_SECTION: SectionSpec = {
  start: 'YOUR INFORMATION',
  end: ['YOUR DEVICE DETAILS', 'YOUR RATE PLAN DETAILS', 'CRITICAL INFORMATION SUMMARY'],
};

export const DEVICE_SECTION: SectionSpec = {
  start: 'YOUR DEVICE DETAILS',
  end: ['YOUR RATE PLAN DETAILS', 'MINIMUM MONTHLY CHARGE', 'TOTAL MONTHLY CHARGE'],
};

export const RATE_PLAN_SECTION: SectionSpec = {
  start: 'YOUR RATE PLAN DETAILS',
  end: ['YOUR RATE PLAN ADD-ONS', 'YOUR PROMOTIONS', 'TOTAL MONTHLY CHARGE', 'ONE-TIME CHARGES'],
};

/**
 * Labels printed beside the extracted fields that OCR tends to merge onto the
 * same line, e.g. "Customer Name: Jane Doe First Bill Date: Dec 5, 2025".
 * The labels of the rules themselves cut values as well.
 */
export const CONTRACT_MERGED_LABELS: readonly string[] = [
  'First Bill Date',
  'Monthly Payment Method',
  'User Name',
  'Default Voicemail Password',
  'Email',
  'E-mail',
  'Store Phone Number',
  'Store',
  'Date',
  'Early Cancellation Fee',
  'Commitment Period',
  'Total Monthly Charge',
];

// ============================================================================
// Rule table
// ============================================================================

export interface ContractRuleOptions {
  dateOrder: DateOrder;
}

export function contractRuleSpecs(options: ContractRuleOptions): ExtractionRuleSpec[] {
  const toDate = dateTransform(options.dateOrder);

  return [
    {
      field: 'customer_name',
      description: 'Customer name, falling back to company name or account identifiers',
      matchers: [
        {
          strategy: 'label',
          labels: [
            'Customer Name',
            'Customer',
            'Company Name',
            'Account Holder',
            'Customer ID',
            'Account Number',
          ],
          section: INFORMATION_SECTION,
        },
      ],
      transform: cleanText,
    },
    {
      field: 'phone',
      description: 'Customer phone number, 10 digits',
      matchers: [
        {
          strategy: 'label',
          labels: ['Phone Number', 'Customer Phone', 'Phone', 'Contact Number', 'Mobile', 'Tel'],
          notAfter: ['Store', 'Dealer', 'Retailer', 'Fax'],
          value: PHONE_VALUE,
          section: INFORMATION_SECTION,
        },
        { strategy: 'format', pattern: PHONE_FORMAT, section: INFORMATION_SECTION },
      ],
      transform: phoneDigits,
    },
    {
      field: 'address',
      description: 'Customer address, possibly over several lines',
      matchers: [
        {
          strategy: 'label',
          labels: ['Customer Address', 'Service Address', 'Billing Address', 'Address'],
          notAfter: ['Email', 'E-mail', 'Store', 'IP', 'MAC', 'Web'],
          block: true,
          section: INFORMATION_SECTION,
        },
      ],
      transform: cleanText,
    },
    {
      field: 'device_model',
      description: 'Device model name',
      matchers: [
        {
          strategy: 'label',
          labels: ['Device Model', 'Model', 'Device'],
          stopLabels: [
            'Early Cancellation Fee',
            'IMEI/ESN/MEID',
            'IMEI',
            'SIM Number',
            'Commitment Period',
            'Start Date',
            'End Date',
          ],
          section: DEVICE_SECTION,
        },
      ],
      transform: cleanText,
    },
    {
      field: 'imei',
      description: 'Device IMEI/MEID, digits only',
      matchers: [
        {
          strategy: 'label',
          labels: IMEI_LABELS,
          value: IMEI_FORMAT,
          section: DEVICE_SECTION,
        },
        {
          strategy: 'label',
          labels: IMEI_LABELS,
          value: IMEI_VALUE,
          section: DEVICE_SECTION,
        },
        { strategy: 'format', pattern: IMEI_FORMAT, section: DEVICE_SECTION },
      ],
      transform: digitRange(13, 17),
    },
    {
      field: 'sim_number',
      description: 'SIM card ICCID, digits only',
      matchers: [
        {
          strategy: 'label',
          labels: ['SIM Number', 'SIM Card Number', 'ICCID', 'SIM'],
          value: SIM_VALUE,
          section: DEVICE_SECTION,
        },
        { strategy: 'format', pattern: SIM_FORMAT, section: DEVICE_SECTION },
      ],
      transform: digitRange(18, 22),
    },
    {
      field: 'plan_name',
      description: 'Rate plan name, without its price',
      matchers: [
        {
          strategy: 'label',
          labels: ['Rate Plan', 'Plan Name', 'Plan'],
          section: RATE_PLAN_SECTION,
        },
      ],
      transform: planName,
    },
    {
      field: 'plan_charge',
      description: 'Monthly rate plan charge',
      matchers: [
        {
          strategy: 'label',
          labels: ['Monthly Rate Plan Charge', 'Monthly Plan Charge', 'Plan Charge'],
          value: MONEY_VALUE,
          section: RATE_PLAN_SECTION,
        },
        {
          strategy: 'label',
          labels: ['Rate Plan', 'Plan Name', 'Plan'],
          value: DOLLAR_AMOUNT,
          section: RATE_PLAN_SECTION,
        },
        {
          strategy: 'label',
          labels: ['Minimum Monthly Charge'],
          value: MONEY_VALUE,
        },
      ],
      transform: parseMoney,
    },
    {
      field: 'contract_date',
      description: 'Contract start date',
      matchers: [
        {
          strategy: 'label',
          labels: ['Contract Date', 'Contract Start Date', 'Start Date', 'Agreement Date', 'Activation Date'],
          value: DATE_VALUE,
          section: DEVICE_SECTION,
        },
        { strategy: 'format', pattern: DATE_FORMAT },
      ],
      transform: toDate,
    },
    {
      field: 'order_number',
      description: 'Order number as printed',
      matchers: [
        {
          strategy: 'label',
          labels: ['Order Number', 'Order No', 'Order #', 'Order ID'],
          value: ORDER_VALUE,
        },
      ],
      transform: orderNumber,
    },
    {
      field: 'contract_end_date',
      description: 'Contract end date',
      matchers: [
        {
          strategy: 'label',
          labels: ['Contract End Date', 'End Date'],
          value: DATE_VALUE,
          section: DEVICE_SECTION,
        },
      ],
      transform: toDate,
    },
    {
      field: 'minimum_monthly_charge',
      description: 'Minimum monthly charge for device and rate plan',
      matchers: [
        {
          strategy: 'label',
          labels: ['Minimum Monthly Charge (for device and rate plan)'],
          value: MONEY_VALUE,
        },
      ],
      transform: parseMoney,
    },
    {
      field: 'activity',
      description: 'Order activity, e.g. new activation or upgrade',
      matchers: [{ strategy: 'label', labels: ['Activity Type', 'Activity'] }],
      transform: cleanText,
    },
  ];
}

export function buildContractRules(options: ContractRuleOptions): RuleSet {
  return createRuleSet(contractRuleSpecs(options), { mergedLabels: CONTRACT_MERGED_LABELS });
}

/**
 * Rule set used by the service, built once at startup.
 */
export const CONTRACT_RULES: RuleSet = buildContractRules({ dateOrder: config.dateOrder });
