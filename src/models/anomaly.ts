/**
 * Anomaly interfaces
 *
 * Data-quality findings raised while validating a document. Anomalies are
 * data, not errors: they become report rows and never abort a job.
 */

import type { FieldName } from './field.js';

/** Page reference used for findings that span the whole document */
export const ALL_PAGES = 'All Pages';

export type PageRef = number | typeof ALL_PAGES;

export type AnomalyIssue =
  | { kind: 'missing' }
  | { kind: 'out_of_range'; value: string }
  | { kind: 'inconsistent' };

export interface Anomaly {
  pageRef: PageRef;
  field: FieldName;
  issue: AnomalyIssue;
}

/**
 * Report text for an anomaly issue, as written to the anomaly report
 */
export function describeIssue(issue: AnomalyIssue): string {
  switch (issue.kind) {
    case 'missing':
      return 'Missing';
    case 'out_of_range':
      return `Out of range: ${issue.value}`;
    case 'inconsistent':
      return 'Inconsistent values';
  }
}

/**
 * Flatten an anomaly into its report row: [page, field, issue]
 */
export function toAnomalyRow(anomaly: Anomaly): [PageRef, FieldName, string] {
  return [anomaly.pageRef, anomaly.field, describeIssue(anomaly.issue)];
}

/**
 * Out-of-range and cross-page inconsistencies are critical; missing fields are not
 */
export function isCritical(anomaly: Anomaly): boolean {
  return anomaly.issue.kind !== 'missing';
}
