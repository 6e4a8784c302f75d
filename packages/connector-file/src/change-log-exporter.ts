/**
 * Change Log Exporter
 * Writes a batch of change events to a timestamped CSV or JSON file
 */

import { join } from 'node:path';
import { formatTimestamp } from '@regwatch/core';
import type { ChangeEvent } from '@regwatch/core';
import { toCsv, writeFileEnsuringDir, type CsvWriteOptions } from './csv-writer.js';

export type ExportFormat = 'csv' | 'json';

export interface ExportOptions extends CsvWriteOptions {
  /** Output directory, created if missing */
  dir: string;
  format: ExportFormat;
  /** Clock used for the file name (default: now) */
  now?: Date;
}

export const CHANGE_LOG_COLUMNS = [
  'identifier',
  'change_type',
  'field_changed',
  'old_value',
  'new_value',
  'date',
  'company_name',
  'state',
  'status',
] as const;

type ChangeLogRow = Record<(typeof CHANGE_LOG_COLUMNS)[number], string>;

function toRow(event: ChangeEvent): ChangeLogRow {
  return {
    identifier: event.identifier,
    change_type: event.changeType,
    field_changed: event.fieldChanged,
    old_value: event.oldValue,
    new_value: event.newValue,
    date: formatTimestamp(event.date),
    company_name: event.companyName,
    state: event.state,
    status: event.status,
  };
}

/**
 * `change_logs_YYYYMMDD_HHMMSS` in UTC
 */
export function exportFileStem(now: Date): string {
  const iso = now.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, '');
  const time = iso.slice(11, 19).replace(/:/g, '');
  return `change_logs_${date}_${time}`;
}

/**
 * Export change events; returns the written path, or null when there is
 * nothing to export
 */
export async function exportChangeLog(
  events: readonly ChangeEvent[],
  options: ExportOptions
): Promise<string | null> {
  if (events.length === 0) return null;

  const rows = events.map(toRow);
  const filePath = join(options.dir, `${exportFileStem(options.now ?? new Date())}.${options.format}`);

  const content =
    options.format === 'csv'
      ? toCsv(rows, CHANGE_LOG_COLUMNS, options)
      : `${JSON.stringify(rows, null, 2)}\n`;

  await writeFileEnsuringDir(filePath, content);
  return filePath;
}
