/**
 * CSV formatting
 *
 * Minimal quoting: a value is quoted only when it contains a comma, a double
 * quote, CR or LF. Rows end with CRLF.
 *
 * @module services/storage/csv
 */

export type CsvCell = string | number;
export type CsvRow = readonly CsvCell[];

export const CSV_LINE_END = '\r\n';

/**
 * Escape a value for CSV
 * - Wrap in quotes if contains comma, quote, or newline
 * - Escape quotes by doubling them
 */
export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

/**
 * Format one row, including its line terminator
 */
export function formatCsvRow(row: CsvRow): string {
  // A lone empty cell is quoted so the row is not read back as a blank line
  if (row.length === 1 && row[0] === '') {
    return '""' + CSV_LINE_END;
  }
  return row.map((cell) => escapeCSV(String(cell))).join(',') + CSV_LINE_END;
}
