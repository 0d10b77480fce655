/**
 * Page-level validation
 *
 * Presence and numeric-range checks over one page's extracted fields.
 * Problems are returned as anomalies, never thrown.
 *
 * @module services/extraction/validator
 */

import { REQUIRED_FIELDS, NUMERIC_RANGES, type FieldMap, type FieldName } from '../../models/field.js';
import type { Anomaly } from '../../models/anomaly.js';

/**
 * Check the first number in `value` against the field's inclusive range.
 * A value with no parsable number, or a field with no range, fails.
 */
export function validateNumeric(field: FieldName, value: string): boolean {
  const range = NUMERIC_RANGES[field];
  if (!range) return false;

  const run = /[\d.]+/.exec(value)?.[0];
  if (run === undefined) return false;

  const parsed = Number(run);
  if (!Number.isFinite(parsed)) return false;

  const [min, max] = range;
  return parsed >= min && parsed <= max;
}

/**
 * Anomalies for one page: every missing field in vocabulary order, then
 * every present numeric field whose value is out of range.
 */
export function validatePage(pageIndex: number, fields: FieldMap): Anomaly[] {
  const anomalies: Anomaly[] = [];

  for (const field of REQUIRED_FIELDS) {
    if (fields[field] === undefined) {
      anomalies.push({ pageRef: pageIndex, field, issue: { kind: 'missing' } });
    }
  }

  for (const field of REQUIRED_FIELDS) {
    const value = fields[field];
    if (value === undefined || NUMERIC_RANGES[field] === undefined) continue;
    if (!validateNumeric(field, value)) {
      anomalies.push({ pageRef: pageIndex, field, issue: { kind: 'out_of_range', value } });
    }
  }

  return anomalies;
}
