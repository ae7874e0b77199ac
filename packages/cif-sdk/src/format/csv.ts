import type { JsonValue } from '../types.js';
import type { Formatter } from './formatter.js';
import { toRecords } from './records.js';

export const DEFAULT_CSV_COLUMNS: readonly string[] = [
  'observable',
  'otype',
  'tags',
  'confidence',
  'provider',
  'tlp',
  'reporttime',
];

/**
 * RFC 4180 CSV, one row per observable. Array cells are joined with `|`,
 * nested objects are written as JSON.
 */
export class CsvFormatter implements Formatter {
  readonly name = 'csv';
  private readonly columns: readonly string[];

  constructor(columns: readonly string[] = DEFAULT_CSV_COLUMNS) {
    this.columns = columns;
  }

  format(data: JsonValue): string {
    const lines = [this.columns.map(escapeCell).join(',')];
    for (const record of toRecords(data)) {
      lines.push(this.columns.map((column) => escapeCell(cellText(record[column]))).join(','));
    }
    return lines.join('\n');
  }
}

function cellText(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (Array.isArray(value)) return value.map(cellText).join('|');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function escapeCell(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
