/**
 * Label-positional field extractor
 *
 * Locates every vocabulary label in a page's text and takes the text between
 * one label and the next as the value of the first. Pure and deterministic:
 * the same text always yields the same FieldMap.
 *
 * Matching is a case-insensitive substring search, not longest-match, so a
 * label contained in another ("Part Number" inside "Customer Part Number")
 * is also found inside the longer label and narrows both value spans.
 *
 * @module services/extraction/extractor
 */

import {
  REQUIRED_FIELDS,
  MAX_FIELD_VALUE_LENGTH,
  type FieldMap,
  type FieldName,
} from '../../models/field.js';

interface LabelOccurrence {
  start: number;
  end: number;
  field: FieldName;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Single-field fallback patterns: the label, optional separators, then the rest of a line
 */
const FIELD_PATTERNS: ReadonlyArray<readonly [FieldName, RegExp]> = REQUIRED_FIELDS.map(
  (field) => [field, new RegExp(`${escapeRegExp(field)}[:\\s]*([^\\n]+)`, 'i')] as const
);

/**
 * Find all non-overlapping occurrences of each label, vocabulary order first
 */
function findOccurrences(lowerText: string): LabelOccurrence[] {
  const occurrences: LabelOccurrence[] = [];
  for (const field of REQUIRED_FIELDS) {
    const needle = field.toLowerCase();
    let from = lowerText.indexOf(needle);
    while (from !== -1) {
      occurrences.push({ start: from, end: from + needle.length, field });
      from = lowerText.indexOf(needle, from + needle.length);
    }
  }
  // Array.prototype.sort is stable, so ties keep vocabulary order
  return occurrences.sort((a, b) => a.start - b.start);
}

/**
 * Strip leading separators, collapse whitespace, cap length.
 * Returns null when nothing is left.
 */
export function normalizeValue(raw: string): string | null {
  const value = raw
    .replace(/^[\s:.-]*/, '')
    .replace(/\s+/g, ' ')
    .trim();
  return value ? value.slice(0, MAX_FIELD_VALUE_LENGTH) : null;
}

/**
 * A match records the trimmed capture even when nothing but whitespace was captured
 */
function matchFallback(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  return match ? (match[1] ?? '').trim() : null;
}

/**
 * Extract vocabulary fields from one page of text.
 *
 * When no label occurs anywhere, each field is tried once with its
 * single-line fallback pattern. Otherwise values are taken positionally and
 * fields still missing afterwards get one fallback attempt each.
 */
export function extractFields(text: string): FieldMap {
  const fields: Partial<Record<FieldName, string>> = {};
  if (!text) {
    return fields;
  }

  const occurrences = findOccurrences(text.toLowerCase());

  if (occurrences.length === 0) {
    for (const [field, pattern] of FIELD_PATTERNS) {
      const value = matchFallback(text, pattern);
      if (value !== null) fields[field] = value;
    }
    return fields;
  }

  occurrences.forEach((occurrence, idx) => {
    const next = occurrences[idx + 1];
    const valueEnd = next ? next.start : text.length;
    // A label overlapping the next one yields an empty span
    const value = normalizeValue(text.slice(occurrence.end, valueEnd));
    if (value !== null) {
      fields[occurrence.field] = value;
    }
  });

  for (const [field, pattern] of FIELD_PATTERNS) {
    if (fields[field] !== undefined) continue;
    const value = matchFallback(text, pattern);
    if (value !== null) fields[field] = value;
  }

  return fields;
}
