/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

import type { PartitionStats } from '../../core/types.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => String(row[col.key] ?? '').length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? 0, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(String(row[col.key] ?? ''), widths[i] ?? 0, col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

// ============================================================================
// Partition Stats
// ============================================================================

const PARTITION_COLUMNS: readonly TableColumn[] = [
  { key: 'domain', header: 'Domain' },
  { key: 'input', header: 'Input', align: 'right' },
  { key: 'valid', header: 'Valid', align: 'right' },
  { key: 'invalid', header: 'Invalid', align: 'right' },
  { key: 'soc', header: 'SOC', align: 'right' },
  { key: 'element', header: 'Element', align: 'right' },
  { key: 'scale', header: 'Scale', align: 'right' },
  { key: 'numeric', header: 'Numeric', align: 'right' },
  { key: 'ciRepairs', header: 'CI swaps', align: 'right' },
];

/**
 * Render per-domain transform counters as a table
 */
export function formatPartitionStats(stats: readonly PartitionStats[]): string {
  const rows = stats.map((s) => ({
    domain: s.domain,
    input: s.input,
    valid: s.valid,
    invalid: s.invalid,
    soc: s.byReason.invalid_soc_format,
    element: s.byReason.missing_element_id,
    scale: s.byReason.invalid_scale_id,
    numeric: s.byReason.invalid_numeric_data_value,
    ciRepairs: s.ciRepairs,
  }));
  return formatTable(rows, PARTITION_COLUMNS);
}
