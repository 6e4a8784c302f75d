/**
 * State Consolidator
 *
 * Merges per-state registry CSVs into one master snapshot. Identifiers are
 * deduplicated across states; the first state (in configuration order) to
 * list a company keeps it.
 */

import { LoadError, formatTimestamp, stringifyFieldValue } from '@regwatch/core';
import type { ColumnOverrides, CompanyRecord, ILogger, Snapshot } from '@regwatch/core';
import { CsvSnapshotLoader } from './csv-snapshot-loader.js';
import { toCsv, writeFileEnsuringDir, type CsvWriteOptions } from './csv-writer.js';

export interface StateSource {
  /** State name as configured, e.g. "maharashtra" */
  state: string;
  filePath: string;
}

export interface StateConsolidatorConfig {
  states: StateSource[];
  /** Observation date for the master snapshot (default: now) */
  snapshotDate?: Date;
  columns?: ColumnOverrides;
  logger?: ILogger;
}

export interface SkippedState {
  state: string;
  filePath: string;
  code: string;
  message: string;
}

export interface ConsolidationResult {
  snapshot: Snapshot;
  loadedStates: string[];
  skippedStates: SkippedState[];
  /** Rows read across all loaded files */
  inputRecordCount: number;
  /** Rows dropped because their identifier was already present */
  duplicateCount: number;
}

export interface MasterTableSummary {
  totalCompanies: number;
  byState: Record<string, number>;
  byStatus: Record<string, number>;
}

/** Canonical master table header, readable by CsvSnapshotLoader */
export const MASTER_TABLE_COLUMNS = [
  'CIN',
  'Company_Name',
  'State',
  'Status',
  'Authorized_Capital',
  'Paidup_Capital',
  'Address',
  'Industry_Classification',
  'snapshot_date',
] as const;

/**
 * Title-case a state name: "tamil nadu" -> "Tamil Nadu"
 */
export function titleCaseState(state: string): string {
  return state
    .trim()
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) =>
      `${boundary}${letter.toUpperCase()}`
    );
}

export class StateConsolidator {
  constructor(private readonly config: StateConsolidatorConfig) {}

  async consolidate(): Promise<ConsolidationResult> {
    const { logger } = this.config;
    const snapshotDate = this.config.snapshotDate ?? new Date();

    const records: CompanyRecord[] = [];
    const seen = new Set<string>();
    const loadedStates: string[] = [];
    const skippedStates: SkippedState[] = [];
    let inputRecordCount = 0;
    let duplicateCount = 0;

    for (const { state, filePath } of this.config.states) {
      const stateName = titleCaseState(state);
      const loader = new CsvSnapshotLoader({
        duplicateIdentifiers: 'first-wins',
        state: stateName,
        snapshotDate,
        columns: this.config.columns,
      });

      let snapshot: Snapshot;
      try {
        snapshot = await loader.load(filePath);
      } catch (error) {
        if (!(error instanceof LoadError)) throw error;
        logger?.warn(`Skipping ${stateName}: ${error.message}`, {
          state: stateName,
          filePath,
          code: error.code,
        });
        skippedStates.push({ state: stateName, filePath, code: error.code, message: error.message });
        continue;
      }

      const dropped = snapshot.droppedDuplicates ?? 0;
      inputRecordCount += snapshot.records.length + dropped;
      duplicateCount += dropped;

      for (const record of snapshot.records) {
        if (seen.has(record.identifier)) {
          duplicateCount++;
          continue;
        }
        seen.add(record.identifier);
        records.push({ ...record, state: stateName });
      }

      loadedStates.push(stateName);
      logger?.info(`Loaded ${snapshot.records.length} records for ${stateName}`, {
        state: stateName,
        records: snapshot.records.length,
      });
    }

    if (loadedStates.length === 0) {
      throw new LoadError({
        code: 'NO_DATA',
        message: 'No state files could be loaded',
        suggestion: 'Check the consolidation.states file paths.',
        context: { skipped: skippedStates.map((s) => s.filePath) },
      });
    }

    logger?.info(`Consolidated ${records.length} companies from ${loadedStates.length} states`, {
      duplicates: duplicateCount,
    });

    return {
      snapshot: {
        snapshotDate,
        records,
        source: 'consolidated',
        droppedDuplicates: duplicateCount,
      },
      loadedStates,
      skippedStates,
      inputRecordCount,
      duplicateCount,
    };
  }
}

function masterTableRow(record: CompanyRecord): Record<string, string> {
  return {
    CIN: record.identifier,
    Company_Name: record.name,
    State: record.state,
    Status: record.status,
    Authorized_Capital: stringifyFieldValue(record.authorizedCapital),
    Paidup_Capital: stringifyFieldValue(record.paidupCapital),
    Address: record.address ?? '',
    Industry_Classification: record.industryClassification ?? '',
    snapshot_date: formatTimestamp(record.snapshotDate),
  };
}

/**
 * Write a snapshot as the consolidated master table CSV.
 *
 * The master table is reloaded as a snapshot, so formula sanitising is off
 * unless requested; an escaped cell would read back as a different value.
 */
export async function writeMasterTable(
  snapshot: Snapshot,
  filePath: string,
  options: CsvWriteOptions = {}
): Promise<void> {
  const content = toCsv(snapshot.records.map(masterTableRow), MASTER_TABLE_COLUMNS, {
    sanitizeFormulas: false,
    ...options,
  });
  await writeFileEnsuringDir(filePath, content);
}

function countBy(records: readonly CompanyRecord[], key: (r: CompanyRecord) => string) {
  const counts = new Map<string, number>();
  for (const record of records) {
    const value = key(record);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries(
    [...counts.entries()].sort(
      ([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : a > b ? 1 : 0)
    )
  );
}

/**
 * Company counts by state and by status
 */
export function summarizeMasterTable(snapshot: Snapshot): MasterTableSummary {
  return {
    totalCompanies: snapshot.records.length,
    byState: countBy(snapshot.records, (r) => r.state),
    byStatus: countBy(snapshot.records, (r) => r.status),
  };
}
