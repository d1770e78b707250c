/**
 * Output formatting for CLI commands
 *
 * @module cli/output
 */

import type { LakeStatusReport } from '../core/types.js';

export type OutputFormat = 'table' | 'json';

export interface TableColumn<T> {
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly value: (row: T) => string;
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

/**
 * Plain-text table with a header row and a separator line
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No lakes configured.';
  }

  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...cells.map((rowCells) => (rowCells[i] ?? '').length))
  );

  const header = columns.map((col, i) => padCell(col.header, widths[i] ?? 0, col.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const body = cells.map((rowCells) =>
    rowCells.map((cell, i) => padCell(cell, widths[i] ?? 0, columns[i]?.align ?? 'left')).join(' | ')
  );

  return [header, separator, ...body].map((line) => line.trimEnd()).join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * `14.3 °C` for a fresh reading, `-` otherwise
 */
export function formatValue(report: LakeStatusReport): string {
  return report.state.value === undefined ? '-' : `${report.state.value.toFixed(1)} °C`;
}

const STATUS_COLUMNS: readonly TableColumn<LakeStatusReport>[] = [
  { header: 'Lake', value: (r) => r.entityId },
  { header: 'Name', value: (r) => r.name },
  { header: 'Source', value: (r) => r.sourceType },
  { header: 'Status', value: (r) => r.state.status },
  { header: 'Value', align: 'right', value: formatValue },
  { header: 'Observed', value: (r) => r.dataTimestamp ?? '-' },
  { header: 'Last update', value: (r) => (r.state.lastUpdateSuccess ? 'ok' : 'failed') },
];

export function formatStatusTable(reports: readonly LakeStatusReport[]): string {
  return formatTable(reports, STATUS_COLUMNS);
}

/**
 * JSON-safe projection of a report
 */
export function statusToJson(report: LakeStatusReport): Record<string, unknown> {
  const { state } = report;
  return {
    entity_id: report.entityId,
    name: report.name,
    source: report.sourceType,
    url: report.url ?? null,
    status: state.status,
    value: state.value ?? null,
    last_reading: state.reading?.value ?? null,
    data_timestamp: report.dataTimestamp ?? null,
    last_update_success: state.lastUpdateSuccess,
    last_error: state.lastError ?? null,
    checked_at: state.checkedAt.toISOString(),
    attribution: report.attribution,
  };
}

export function formatStatusJson(reports: readonly LakeStatusReport[]): string {
  return formatJson(reports.map(statusToJson));
}

export function formatStatus(reports: readonly LakeStatusReport[], format: OutputFormat): string {
  return format === 'json' ? formatStatusJson(reports) : formatStatusTable(reports);
}
