/**
 * Cross-page consistency checks
 *
 * @module services/extraction/consistency
 */

import { CONSISTENCY_FIELDS, type FieldMap, type FieldName } from '../../models/field.js';
import { ALL_PAGES, type Anomaly } from '../../models/anomaly.js';

/**
 * True when the field takes at most one distinct value across the pages
 * that have it. A field absent from every page is consistent.
 */
export function checkConsistency(field: FieldName, pages: Iterable<FieldMap>): boolean {
  const values = new Set<string>();
  for (const fields of pages) {
    const value = fields[field];
    if (value !== undefined) values.add(value);
  }
  return values.size <= 1;
}

/**
 * One "All Pages" anomaly per consistency field that takes several values
 */
export function runConsistencyChecks(pages: readonly FieldMap[]): Anomaly[] {
  return CONSISTENCY_FIELDS.filter((field) => !checkConsistency(field, pages)).map(
    (field): Anomaly => ({
      pageRef: ALL_PAGES,
      field,
      issue: { kind: 'inconsistent' },
    })
  );
}
