/**
 * Maps raw rows from registry files onto CompanyRecord
 *
 * Registry exports disagree on column naming (CIN vs identifier, the MCA
 * "CompanyStatus" family vs the consolidated "Status" family), so every
 * record field accepts a list of header aliases. The first alias present in
 * a row wins.
 */

import { LoadError, parseSnapshotDate, stringifyFieldValue } from '@regwatch/core';
import type {
  ColumnOverrides,
  CompanyRecord,
  DuplicatePolicy,
  Snapshot,
} from '@regwatch/core';

/** A parsed row keyed by source header */
export type RawRow = Record<string, unknown>;

export type MappedField = keyof CompanyRecord;

export type ColumnAliases = Readonly<Record<MappedField, readonly string[]>>;

export const DEFAULT_COLUMNS: ColumnAliases = {
  identifier: ['CIN', 'identifier'],
  name: ['Company_Name', 'CompanyName', 'name'],
  state: ['State', 'state', 'CompanyStateCode'],
  status: ['Status', 'CompanyStatus', 'status'],
  authorizedCapital: ['Authorized_Capital', 'AuthorizedCapital', 'authorized_capital'],
  paidupCapital: ['Paidup_Capital', 'PaidupCapital', 'paidup_capital'],
  address: ['Address', 'Registered_Office_Address', 'address'],
  industryClassification: [
    'Industry_Classification',
    'CompanyIndustrialClassification',
    'industry_classification',
  ],
  snapshotDate: ['snapshot_date', 'Snapshot_Date'],
};

const MAPPED_FIELDS = Object.keys(DEFAULT_COLUMNS).filter(
  (key): key is MappedField => key in DEFAULT_COLUMNS
);

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export interface RecordMappingOptions {
  /** Representative snapshot date; defaults to the first dated record */
  snapshotDate?: Date;
  /** State applied to rows that carry none */
  state?: string;
  /** Header aliases replacing the defaults per field */
  columns?: ColumnOverrides;
  /** What to do with a repeated identifier (default: 'reject') */
  duplicateIdentifiers?: DuplicatePolicy;
}

/**
 * Merge per-loader overrides over the default aliases
 */
export function resolveColumns(overrides?: ColumnOverrides): ColumnAliases {
  const resolved: Record<MappedField, readonly string[]> = { ...DEFAULT_COLUMNS };
  if (!overrides) return resolved;

  for (const field of MAPPED_FIELDS) {
    const aliases = overrides[field];
    if (aliases && aliases.length > 0) {
      resolved[field] = aliases;
    }
  }
  return resolved;
}

/**
 * Reject header names that would pollute record prototypes
 */
export function assertSafeHeaders(headers: Iterable<string>, source: string): void {
  for (const header of headers) {
    if (FORBIDDEN_RECORD_KEYS.has(header)) {
      throw new LoadError({
        code: 'MALFORMED_RECORD',
        message: `Unsafe column name: ${header}`,
        source,
        suggestion: 'Rename the column to a safe field name and try again.',
      });
    }
  }
}

function pick(row: RawRow, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    if (Object.prototype.hasOwnProperty.call(row, alias)) {
      return row[alias];
    }
  }
  return undefined;
}

function malformed(source: string, row: number, message: string): LoadError {
  return new LoadError({
    code: 'MALFORMED_RECORD',
    message: `Row ${row}: ${message}`,
    source,
    suggestion: 'Fix or remove the row and rerun.',
    context: { row },
  });
}

/**
 * Parse a capital amount; thousands separators are removed first
 */
export function parseCapital(value: unknown): number | null | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  const text = stringifyFieldValue(value).replace(/,/g, '');
  if (text === '') return null;
  const amount = Number(text);
  return Number.isFinite(amount) ? amount : undefined;
}

function optionalText(value: unknown): string | null {
  const text = stringifyFieldValue(value);
  return text === '' ? null : text;
}

type UndatedRecord = Omit<CompanyRecord, 'snapshotDate'> & { snapshotDate: Date | null };

function mapRow(
  row: RawRow,
  rowNumber: number,
  columns: ColumnAliases,
  source: string,
  options: RecordMappingOptions
): UndatedRecord {
  const identifier = stringifyFieldValue(pick(row, columns.identifier));
  if (identifier === '') {
    throw malformed(source, rowNumber, 'missing identifier');
  }

  const authorizedCapital = parseCapital(pick(row, columns.authorizedCapital));
  if (authorizedCapital === undefined) {
    throw malformed(source, rowNumber, `unparseable authorized capital for ${identifier}`);
  }

  const paidupCapital = parseCapital(pick(row, columns.paidupCapital));
  if (paidupCapital === undefined) {
    throw malformed(source, rowNumber, `unparseable paid-up capital for ${identifier}`);
  }

  const dateText = stringifyFieldValue(pick(row, columns.snapshotDate));
  const snapshotDate = dateText === '' ? null : parseSnapshotDate(dateText);
  if (dateText !== '' && snapshotDate === null) {
    throw malformed(source, rowNumber, `unparseable snapshot date "${dateText}"`);
  }

  const state = stringifyFieldValue(pick(row, columns.state));

  return {
    identifier,
    name: stringifyFieldValue(pick(row, columns.name)),
    state: state === '' ? (options.state ?? '') : state,
    status: stringifyFieldValue(pick(row, columns.status)),
    authorizedCapital,
    paidupCapital,
    address: optionalText(pick(row, columns.address)),
    industryClassification: optionalText(pick(row, columns.industryClassification)),
    snapshotDate,
  };
}

/**
 * Build a snapshot from raw rows.
 *
 * Row numbers in errors are 1-based over data rows.
 *
 * @throws LoadError MALFORMED_RECORD, DUPLICATE_IDENTIFIER or MISSING_SNAPSHOT_DATE
 */
export function buildSnapshot(
  rows: readonly RawRow[],
  source: string,
  options: RecordMappingOptions = {}
): Snapshot {
  const columns = resolveColumns(options.columns);
  const policy = options.duplicateIdentifiers ?? 'reject';

  const seen = new Map<string, number>();
  const mapped: UndatedRecord[] = [];
  let droppedDuplicates = 0;

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const record = mapRow(row, rowNumber, columns, source, options);

    const firstRow = seen.get(record.identifier);
    if (firstRow !== undefined) {
      if (policy === 'first-wins') {
        droppedDuplicates++;
        return;
      }
      throw new LoadError({
        code: 'DUPLICATE_IDENTIFIER',
        message: `Identifier ${record.identifier} appears in rows ${firstRow} and ${rowNumber}`,
        source,
        suggestion: "Deduplicate the file or load it with duplicateIdentifiers: 'first-wins'.",
        context: { identifier: record.identifier, rows: [firstRow, rowNumber] },
      });
    }

    seen.set(record.identifier, rowNumber);
    mapped.push(record);
  });

  const snapshotDate =
    options.snapshotDate ?? mapped.find((r) => r.snapshotDate !== null)?.snapshotDate ?? null;
  if (snapshotDate === null) {
    throw new LoadError({
      code: 'MISSING_SNAPSHOT_DATE',
      message: `No snapshot date for ${source}`,
      source,
      suggestion: 'Add a snapshot_date column or pass snapshotDate to the loader.',
    });
  }

  const records: CompanyRecord[] = mapped.map((record) => ({
    ...record,
    snapshotDate: record.snapshotDate ?? snapshotDate,
  }));

  const snapshot: Snapshot = { snapshotDate, records, source };
  if (policy === 'first-wins') {
    snapshot.droppedDuplicates = droppedDuplicates;
  }
  return snapshot;
}
