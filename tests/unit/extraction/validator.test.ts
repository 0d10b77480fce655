/**
 * Unit tests for numeric and page-level validation
 *
 * @module tests/unit/extraction/validator
 */

import { describe, it, expect } from 'vitest';
import { validateNumeric, validatePage } from '../../../src/services/extraction/validator.js';
import { REQUIRED_FIELDS, type FieldMap, type FieldName } from '../../../src/models/field.js';

function allFields(overrides: Partial<Record<FieldName, string>> = {}): FieldMap {
  const fields: Partial<Record<FieldName, string>> = {};
  for (const field of REQUIRED_FIELDS) fields[field] = 'ok';
  fields.Resistance = '100';
  fields.Dimension = '1.0';
  return { ...fields, ...overrides };
}

describe('validateNumeric', () => {
  it('accepts values inside the inclusive range', () => {
    expect(validateNumeric('Resistance', '95')).toBe(true);
    expect(validateNumeric('Resistance', '100')).toBe(true);
    expect(validateNumeric('Resistance', '105')).toBe(true);
    expect(validateNumeric('Dimension', '1.1mm')).toBe(true);
  });

  it('rejects values outside the range', () => {
    expect(validateNumeric('Resistance', '105.1')).toBe(false);
    expect(validateNumeric('Dimension', '0.89')).toBe(false);
  });

  it('uses the first run of digits and dots', () => {
    expect(validateNumeric('Resistance', 'R=99.9 ohm (nominal 200)')).toBe(true);
  });

  it('treats unparsable values as failures', () => {
    expect(validateNumeric('Resistance', 'abc')).toBe(false);
    expect(validateNumeric('Resistance', '. ohm')).toBe(false);
    expect(validateNumeric('Dimension', '1.2.3')).toBe(false);
  });

  it('fails for a field without a range', () => {
    expect(validateNumeric('Customer Name', '100')).toBe(false);
  });
});

describe('validatePage', () => {
  it('reports every field missing from an empty page, in vocabulary order', () => {
    const anomalies = validatePage(3, {});
    expect(anomalies).toHaveLength(23);
    expect(anomalies.map((a) => a.field)).toEqual([...REQUIRED_FIELDS]);
    expect(anomalies.every((a) => a.pageRef === 3 && a.issue.kind === 'missing')).toBe(true);
  });

  it('reports nothing for a complete, in-range page', () => {
    expect(validatePage(1, allFields())).toEqual([]);
  });

  it('reports out-of-range numeric values with the value', () => {
    const anomalies = validatePage(2, allFields({ Resistance: '110 ohm' }));
    expect(anomalies).toEqual([
      { pageRef: 2, field: 'Resistance', issue: { kind: 'out_of_range', value: '110 ohm' } },
    ]);
  });

  it('lists missing fields before out-of-range ones', () => {
    const fields: Partial<Record<FieldName, string>> = { ...allFields({ Dimension: '2.0' }) };
    delete fields['Test Result'];
    const anomalies = validatePage(5, fields);
    expect(anomalies).toEqual([
      { pageRef: 5, field: 'Test Result', issue: { kind: 'missing' } },
      { pageRef: 5, field: 'Dimension', issue: { kind: 'out_of_range', value: '2.0' } },
    ]);
  });

  it('does not range-check a missing numeric field', () => {
    const fields: Partial<Record<FieldName, string>> = { ...allFields() };
    delete fields.Resistance;
    expect(validatePage(1, fields)).toEqual([
      { pageRef: 1, field: 'Resistance', issue: { kind: 'missing' } },
    ]);
  });
});
