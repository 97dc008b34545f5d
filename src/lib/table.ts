import type { StatusTable, StorageSystemRecord, TimestampValue } from '../types/storage-insights';

export const MISSING_TIMESTAMP = '—';

export const TABLE_HEADERS = [
  'Name',
  'Last Successful Probe (UTC)',
  'Last Successful Monitor (UTC)',
  'Condition',
] as const;

/**
 * Epoch millis to ISO-8601 UTC; null, undefined, 0 and '' render as the placeholder.
 * Text and out-of-range numbers are shown as they are.
 */
export function formatTimestamp(ms: TimestampValue | undefined): string {
  if (!ms) return MISSING_TIMESTAMP;
  if (typeof ms === 'string') return ms;
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return String(ms);
  return date.toISOString();
}

export type RenderTableOptions = {
  limit?: number;
};

export function renderTable(
  records: readonly StorageSystemRecord[],
  options: RenderTableOptions = {}
): StatusTable {
  const selected = options.limit === undefined ? records : records.slice(0, Math.max(0, options.limit));

  const rows = selected.map((record) => [
    record.name,
    formatTimestamp(record.lastSuccessfulProbe),
    formatTimestamp(record.lastSuccessfulMonitor),
    record.condition,
  ]);

  const widths = TABLE_HEADERS.map((header, idx) =>
    rows.reduce((width, row) => Math.max(width, (row[idx] ?? '').length), header.length)
  );

  const formatRow = (cells: readonly string[]) =>
    widths.map((width, idx) => (cells[idx] ?? '').padEnd(width)).join(' | ');
  const divider = widths.map((width) => '-'.repeat(width)).join('-+-');

  const lines = [formatRow(TABLE_HEADERS), divider, ...rows.map(formatRow)];
  return {
    headers: TABLE_HEADERS,
    rows,
    text: lines.join('\n'),
  };
}
