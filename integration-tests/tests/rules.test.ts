/**
 * Field Extractor Rule Tests
 *
 * Label-anchored and format-anchored matching, tie-breaks, and rule table
 * construction.
 */

import {
  CONTRACT_RULES,
  compileLabel,
  createRuleSet,
  defineRule,
  runRule,
} from '@contract-ocr/shared';
import { ruleFor } from './helpers';

describe('compileLabel', () => {
  it('should match a label tolerant of spacing around the colon', () => {
    const { pattern } = compileLabel('Customer Name');

    expect('Customer Name :  Jane'.replace(pattern, '')).toBe('Jane');
    expect('CUSTOMER NAME: Jane'.replace(pattern, '')).toBe('Jane');
  });

  it('should only match whole words', () => {
    const { pattern } = compileLabel('Phone');

    expect('Smartphone: 1'.replace(pattern, '')).toBe('Smartphone: 1');
  });

  it('should skip labels preceded by an excluded word', () => {
    const { pattern } = compileLabel('Phone', ['Store']);

    expect('Store Phone: 1'.replace(pattern, '')).toBe('Store Phone: 1');
    expect('Phone: 1'.replace(pattern, '')).toBe('1');
  });

  it('should make the colon optional for # labels', () => {
    const { pattern } = compileLabel('Order #');

    expect('Order # A-1'.replace(pattern, '')).toBe('A-1');
    expect('Order #: A-1'.replace(pattern, '')).toBe('A-1');
  });
});

describe('rule construction', () => {
  it('should reject label matchers placed after a format matcher', () => {
    expect(() =>
      defineRule({
        field: 'phone',
        description: 'misordered',
        matchers: [
          { strategy: 'format', pattern: /\d{10}/ },
          { strategy: 'label', labels: ['Phone'] },
        ],
      })
    ).toThrow('Rule for phone: label matchers must precede format matchers');
  });

  it('should reject two rules for the same field', () => {
    const spec = {
      field: 'phone' as const,
      description: 'phone',
      matchers: [{ strategy: 'label' as const, labels: ['Phone'] }],
    };

    expect(() => createRuleSet([spec, spec])).toThrow('Duplicate extraction rule for field: phone');
  });

  it('should cut values only at known label phrases', () => {
    const spec = {
      field: 'activity' as const,
      description: 'activity',
      matchers: [{ strategy: 'label' as const, labels: ['Activity'] }],
    };
    const text = 'Activity: New Activation Store: Main St';

    expect(runRule(defineRule(spec), text)).toMatchObject({ value: 'New Activation Store: Main St' });
    expect(runRule(defineRule(spec, { mergedLabels: ['Store'] }), text)).toMatchObject({
      value: 'New Activation',
    });
  });

  it('should cut a value at the label of another rule in the set', () => {
    const [activity] = createRuleSet([
      {
        field: 'activity',
        description: 'activity',
        matchers: [{ strategy: 'label', labels: ['Activity'] }],
      },
      {
        field: 'order_number',
        description: 'order',
        matchers: [{ strategy: 'label', labels: ['Order Number'] }],
      },
    ]);

    expect(runRule(activity, 'Activity: New Activation Order Number: 15')).toMatchObject({
      value: 'New Activation',
    });
  });

  it('should freeze the contract rule table', () => {
    expect(Object.isFrozen(CONTRACT_RULES)).toBe(true);
    expect(CONTRACT_RULES.every((rule) => Object.isFrozen(rule))).toBe(true);
    expect(CONTRACT_RULES.map((rule) => rule.field)).toEqual([
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
  });
});

describe('runRule', () => {
  it('should report no match on empty text', () => {
    expect(runRule(ruleFor('phone'), '')).toEqual({ found: false, reason: 'no_match' });
  });

  it('should prefer a labelled value over an earlier format match', () => {
    const result = runRule(ruleFor('phone'), 'Ref 987-654-3210\nPhone: (555) 123-4567');

    expect(result).toEqual({
      found: true,
      value: '5551234567',
      strategy: 'label',
      label: 'Phone',
      index: 17,
      raw: '(555) 123-4567',
    });
  });

  it('should try label alternatives in priority order', () => {
    const result = runRule(ruleFor('phone'), 'Phone: 111-111-1111\nPhone Number: 222-222-2222');

    expect(result.found && result.value).toBe('2222222222');
  });

  it('should ignore the store phone number', () => {
    const text = 'Store Phone Number: (780) 555-0100\nPhone Number: (780) 617-4431';

    expect(runRule(ruleFor('phone'), text)).toMatchObject({
      found: true,
      value: '7806174431',
      label: 'Phone Number',
    });
  });

  it('should fall back to the value format when no label is present', () => {
    expect(runRule(ruleFor('phone'), 'Call us at 780-555-0199 anytime')).toEqual({
      found: true,
      value: '7805550199',
      strategy: 'format',
      label: null,
      index: 11,
      raw: '780-555-0199',
    });
  });

  it('should take the first format match in document order', () => {
    const result = runRule(ruleFor('contract_date'), 'Printed 2024-03-12 Signed 2024-04-01');

    expect(result).toMatchObject({ found: true, value: '2024-03-12', strategy: 'format' });
  });

  it('should move on when a labelled value fails its transform', () => {
    const result = runRule(ruleFor('imei'), 'IMEI: 12345\nBox label 359201123456789');

    expect(result).toMatchObject({ found: true, value: '359201123456789', strategy: 'format' });
  });

  it('should normalize IMEI digits', () => {
    const result = runRule(ruleFor('imei'), 'IMEI: 35-9201-123456-7');

    expect(result.found && result.value).toBe('3592011234567');
  });

  it('should read the value from the next line when the label stands alone', () => {
    const result = runRule(ruleFor('customer_name'), 'Customer Name:\nJane Doe');

    expect(result.found && result.value).toBe('Jane Doe');
  });

  it('should not read a following label line as the value', () => {
    const result = runRule(ruleFor('customer_name'), 'Customer Name:\nPhone: 555-123-4567');

    expect(result).toEqual({ found: false, reason: 'no_match' });
  });

  it('should match labels case-insensitively', () => {
    const result = runRule(ruleFor('customer_name'), 'customer name: jane doe');

    expect(result.found && result.value).toBe('jane doe');
  });

  it('should cut a value at a label merged onto the same line', () => {
    const result = runRule(ruleFor('order_number'), 'Order Number: 151687471 Date: 2024-01-15');

    expect(result.found && result.value).toBe('151687471');
  });

  it('should not read a bare Order label as the order number', () => {
    expect(runRule(ruleFor('order_number'), 'Order: 151687471')).toEqual({
      found: false,
      reason: 'no_match',
    });
  });

  it('should prefer a standalone 15-digit IMEI over trailing digit groups', () => {
    expect(runRule(ruleFor('imei'), 'IMEI: 359201123456789 1')).toEqual({
      found: true,
      value: '359201123456789',
      strategy: 'label',
      label: 'IMEI',
      index: 0,
      raw: '359201123456789',
    });
  });

  it('should accept an order number label without a colon', () => {
    const result = runRule(ruleFor('order_number'), 'Order # A-00231');

    expect(result.found && result.value).toBe('A-00231');
  });

  it('should read a multi-line address block', () => {
    const text =
      'Email Address: jane@example.com\n' +
      'Address: 12 Elm Street\n' +
      'Springfield AB T5T 1A1\n' +
      'Phone: 555-123-4567';

    const result = runRule(ruleFor('address'), text);

    expect(result.found && result.value).toBe('12 Elm Street Springfield AB T5T 1A1');
  });

  it('should stop a device model at the next field name', () => {
    const result = runRule(ruleFor('device_model'), 'Model: Galaxy S24 IMEI 359201123456789');

    expect(result.found && result.value).toBe('Galaxy S24');
  });

  it('should give the same result on repeated runs', () => {
    const rule = ruleFor('contract_date');
    const text = 'Contract Date: March 12, 2024';

    expect(runRule(rule, text)).toEqual(runRule(rule, text));
  });
});

describe('merged labels', () => {
  it('should keep a multi-word plan name before a merged charge label', () => {
    const result = runRule(
      ruleFor('plan_name'),
      'Plan: Gold Unlimited Monthly Rate Plan Charge: $49.99'
    );

    expect(result.found && result.value).toBe('Gold Unlimited');
  });

  it('should keep a customer name before a merged bill date', () => {
    const result = runRule(
      ruleFor('customer_name'),
      'Customer Name: Jane Doe First Bill Date: Dec 5, 2025'
    );

    expect(result.found && result.value).toBe('Jane Doe');
  });

  it('should keep a three-word customer name before a merged phone label', () => {
    const result = runRule(
      ruleFor('customer_name'),
      'Customer Name: Jane Mary Doe Phone: 555-123-4567'
    );

    expect(result.found && result.value).toBe('Jane Mary Doe');
  });

  it('should keep a multi-word device model before a merged fee label', () => {
    const result = runRule(
      ruleFor('device_model'),
      'Model: Galaxy Tab Early Cancellation Fee(s): $0.00'
    );

    expect(result.found && result.value).toBe('Galaxy Tab');
  });

  it('should keep a multi-word activity before a merged store phone label', () => {
    const result = runRule(
      ruleFor('activity'),
      'Activity: New Activation Store Phone Number: (780) 555-0100'
    );

    expect(result.found && result.value).toBe('New Activation');
  });
});

describe('sections', () => {
  const storeFirst =
    'STORE INFORMATION:\n' +
    'Address: 100 Mall Road\n' +
    'Store Phone Number: (780) 555-0100\n' +
    'YOUR INFORMATION:\n' +
    'Customer Name: Jane Doe\n' +
    'Address: 12 Elm Street';

  it('should read the customer address from the customer section', () => {
    expect(runRule(ruleFor('address'), storeFirst)).toEqual({
      found: true,
      value: '12 Elm Street',
      strategy: 'label',
      label: 'Address',
      index: 119,
      raw: '12 Elm Street',
    });
  });

  it('should not fall back to a store phone outside the customer section', () => {
    expect(runRule(ruleFor('phone'), storeFirst)).toEqual({ found: false, reason: 'no_match' });
  });

  it('should search the whole text when the section heading is missing', () => {
    const result = runRule(ruleFor('address'), 'Address: 100 Mall Road');

    expect(result.found && result.value).toBe('100 Mall Road');
  });

  it('should end a section at its end heading', () => {
    const text =
      'Plan: Basic Protection\n' +
      'YOUR RATE PLAN DETAILS:\n' +
      'Plan: Gold Unlimited $49.99\n' +
      'YOUR PROMOTIONS:\n' +
      'Plan Charge: $5.00';

    expect(runRule(ruleFor('plan_name'), text)).toMatchObject({
      found: true,
      value: 'Gold Unlimited',
      index: 47,
    });
    expect(runRule(ruleFor('plan_charge'), text)).toMatchObject({ found: true, value: 49.99 });
  });
});
