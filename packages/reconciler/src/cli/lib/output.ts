/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json, ndjson, csv formats
 *
 * @module cli/lib/output
 */

import type { PoleReport } from '@make-ready/types';
import { formatMidspan } from '../../core/units.js';

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right' | 'center';
  readonly formatter?: (value: unknown) => string;
}

function cellText(row: Readonly<Record<string, unknown>>, column: TableColumn): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Format data as a table
 */
export function formatTable<T extends Readonly<Record<string, unknown>>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cellText(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const formatted = cellText(row, col);
        return padCell(formatted, widths[i] ?? formatted.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right' | 'center'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;

  switch (align) {
    case 'right':
      return truncated.padStart(width);
    case 'center': {
      const padding = width - truncated.length;
      const leftPad = Math.floor(padding / 2);
      return ' '.repeat(leftPad) + truncated + ' '.repeat(padding - leftPad);
    }
    default:
      return truncated.padEnd(width);
  }
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as NDJSON
 */
export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Format data as CSV
 */
export function formatCsv<T extends Readonly<Record<string, unknown>>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  if (data.length === 0) {
    return headerRow;
  }

  const dataRows = data.map((row) => columns.map((col) => escapeCSV(cellText(row, col))).join(','));

  return [headerRow, ...dataRows].join('\n');
}

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data in the specified format
 */
export function formatOutput<T extends Readonly<Record<string, unknown>>>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Missing values as N/A
   */
  orNotAvailable: (value: unknown): string => {
    if (value === null || value === undefined || value === '') return 'N/A';
    return String(value);
  },
};

// ============================================================================
// Pole Summary
// ============================================================================

export const POLE_SUMMARY_COLUMNS: readonly TableColumn[] = [
  { key: 'operation', header: '#', align: 'right' },
  { key: 'pole', header: 'Pole' },
  { key: 'action', header: 'Action' },
  { key: 'status', header: 'Status' },
  { key: 'owner', header: 'Owner', formatter: formatters.orNotAvailable },
  { key: 'structure', header: 'Structure', formatter: formatters.orNotAvailable },
  { key: 'pla', header: 'PLA', formatter: formatters.orNotAvailable },
  { key: 'grade', header: 'Grade', formatter: formatters.orNotAvailable },
  { key: 'riser', header: 'Riser' },
  { key: 'guy', header: 'Guy' },
  { key: 'midspan', header: 'Midspan Proposed' },
  { key: 'attachments', header: 'Attachments', align: 'right' },
];

/**
 * One summary table row per pole
 */
export function poleSummaryRow(pole: PoleReport): Record<string, unknown> {
  return {
    operation: pole.operationNumber ?? '',
    pole: pole.poleNumber,
    action: pole.action,
    status: pole.status,
    owner: pole.owner,
    structure: pole.structure,
    pla: pole.plaPercentage,
    grade: pole.constructionGrade,
    riser: pole.proposedRiser,
    guy: pole.proposedGuy,
    midspan: formatMidspan(pole.midspanProposed),
    attachments: pole.rows.filter((row) => row.kind === 'attachment').length,
  };
}
