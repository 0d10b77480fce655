/**
 * Field vocabulary for QA document validation
 *
 * The fixed set of labels looked for on every page, in output order.
 * Shared read-only by the extractor, the validators and the artifact writers.
 */

/**
 * Required field labels, in the order rows are written to every artifact
 */
export const REQUIRED_FIELDS = [
  'Customer Name',
  'Customer P.O. Number',
  'Customer Part Number',
  'Customer Part Number Revision',
  'AEM Part Number',
  'AEM Lot Number',
  'AEM Date Code',
  'AEM Cage Code',
  'Customer Quality Clauses',
  'FAI Form 3',
  'Solderability Test Report',
  'DPA',
  'Visual Inspection Record',
  'Shipment Quantity',
  'Reel Labels',
  'Certificate of Conformance',
  'Route Sheet',
  'Part Number',
  'Lot Number',
  'Date',
  'Resistance',
  'Dimension',
  'Test Result',
] as const;

export type FieldName = (typeof REQUIRED_FIELDS)[number];

/**
 * Inclusive [min, max] range per numeric field
 */
export const NUMERIC_RANGES: Readonly<Partial<Record<FieldName, readonly [number, number]>>> = {
  Resistance: [95, 105],
  Dimension: [0.9, 1.1],
};

/**
 * Fields compared across all pages once extraction is complete
 */
export const CONSISTENCY_FIELDS: readonly FieldName[] = ['Part Number', 'Lot Number', 'Date'];

/** Maximum length of a positionally extracted value */
export const MAX_FIELD_VALUE_LENGTH = 1000;

/**
 * Extracted values for one page, keyed by field label.
 * Keys are a subset of REQUIRED_FIELDS.
 */
export type FieldMap = Readonly<Partial<Record<FieldName, string>>>;
