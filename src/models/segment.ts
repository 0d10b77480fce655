/**
 * Segment interfaces
 *
 * A segment is a checkpointed batch of result rows covering a contiguous
 * run of pages. Written once, read once during merge, then discarded.
 */

import type { FieldName } from './field.js';

export type FieldStatus = 'Found' | 'Missing';

/**
 * One (page, field) result row. `value` is empty when the field is missing.
 */
export interface SegmentRow {
  page: number;
  field: FieldName;
  status: FieldStatus;
  value: string;
}

/** Header of the final per-page artifact */
export const RESULT_HEADER = ['Page', 'Field', 'Result', 'Output'] as const;

/** Header of the per-field summary artifact */
export const SUMMARY_HEADER = ['Field', 'Status', 'Output'] as const;

/** Header of the anomaly report artifact */
export const ANOMALY_HEADER = ['Page', 'Field', 'Issue'] as const;
