/**
 * Rendering of processing reports.
 */

import type { ReportRow } from '../types.js';

/**
 * Report columns in output order, with their external header names
 */
export const REPORT_COLUMNS: readonly (readonly [keyof ReportRow, string])[] = [
  ['original', 'original'],
  ['newName', 'new_name'],
  ['width', 'width'],
  ['height', 'height'],
  ['format', 'format'],
  ['metadataRemoved', 'exif_removed'],
  ['gpsPresentBefore', 'gps_present_before'],
];

function cell(row: ReportRow, key: keyof ReportRow): string {
  return String(row[key]);
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * CSV with a header line; fields quoted as in RFC 4180, `\n` line endings
 */
export function formatReportCsv(rows: readonly ReportRow[]): string {
  const lines = [
    REPORT_COLUMNS.map(([, header]) => header).join(','),
    ...rows.map(row => REPORT_COLUMNS.map(([key]) => csvField(cell(row, key))).join(',')),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Rows keyed by the external column names, for JSON output
 */
export function reportRecords(rows: readonly ReportRow[]): Record<string, string | number | boolean>[] {
  return rows.map(row => Object.fromEntries(REPORT_COLUMNS.map(([key, header]) => [header, row[key]])));
}

/**
 * Fixed-width text table for terminals
 */
export function formatReportTable(rows: readonly ReportRow[]): string {
  const headers = REPORT_COLUMNS.map(([, header]) => header);
  const body = rows.map(row => REPORT_COLUMNS.map(([key]) => cell(row, key)));
  const widths = headers.map((h, i) => Math.max(h.length, ...body.map(r => (r[i] ?? '').length)));

  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ').trimEnd();
  return [line(headers), line(widths.map(w => '-'.repeat(w))), ...body.map(line)].join('\n');
}
