/**
 * CSV Snapshot Loader
 * Reads registry CSV exports (per-state MCA files, consolidated master tables)
 */

import { parse } from 'csv-parse/sync';
import { BaseFileLoader, type FileLoaderOptions } from './base-file-loader.js';
import { assertSafeHeaders, type RawRow } from './record-mapper.js';

export interface CsvLoaderOptions extends FileLoaderOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
}

function toCells(row: unknown): string[] {
  return Array.isArray(row) ? row.map((cell) => String(cell ?? '')) : [];
}

export class CsvSnapshotLoader extends BaseFileLoader<CsvLoaderOptions> {
  constructor(options: CsvLoaderOptions = {}) {
    super(options);
  }

  protected parseContent(content: string, source: string): RawRow[] {
    const parsed: unknown = parse(content, {
      columns: false, // Parse rows first so we can safely map headers ourselves
      delimiter: this.options.delimiter ?? ',',
      quote: this.options.quote ?? '"',
      skip_empty_lines: true,
      trim: true,
      bom: true,
      cast: false, // Keep CINs and capitals as text; the mapper parses them
    });

    if (!Array.isArray(parsed) || parsed.length === 0) return [];

    const [headerRow, ...dataRows] = parsed;
    const headers = toCells(headerRow);
    assertSafeHeaders(headers, source);

    return dataRows.map((row) => {
      const cells = toCells(row);
      const record: RawRow = Object.create(null);
      headers.forEach((header, i) => {
        record[header] = cells[i];
      });
      return record;
    });
  }
}
