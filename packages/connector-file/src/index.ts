/**
 * @regwatch/connector-file
 *
 * File-based snapshot loaders, state consolidation and change log export
 */

export { BaseFileLoader } from './base-file-loader.js';
export type { FileLoaderOptions } from './base-file-loader.js';

export {
  DEFAULT_COLUMNS,
  assertSafeHeaders,
  buildSnapshot,
  parseCapital,
  resolveColumns,
} from './record-mapper.js';
export type {
  ColumnAliases,
  MappedField,
  RawRow,
  RecordMappingOptions,
} from './record-mapper.js';

export { CsvSnapshotLoader } from './csv-snapshot-loader.js';
export type { CsvLoaderOptions } from './csv-snapshot-loader.js';

export { JsonSnapshotLoader } from './json-snapshot-loader.js';
export type { JsonLoaderOptions } from './json-snapshot-loader.js';

export { AutoSnapshotLoader, createSnapshotLoader } from './loader-factory.js';
export type { SnapshotLoaderOptions } from './loader-factory.js';

export { sanitizeFormulaValue, toCsv } from './csv-writer.js';
export type { CsvWriteOptions } from './csv-writer.js';

export {
  MASTER_TABLE_COLUMNS,
  StateConsolidator,
  summarizeMasterTable,
  titleCaseState,
  writeMasterTable,
} from './state-consolidator.js';
export type {
  ConsolidationResult,
  MasterTableSummary,
  SkippedState,
  StateConsolidatorConfig,
  StateSource,
} from './state-consolidator.js';

export { CHANGE_LOG_COLUMNS, exportChangeLog, exportFileStem } from './change-log-exporter.js';
export type { ExportFormat, ExportOptions } from './change-log-exporter.js';

// Re-export core types for convenience
export type { ISnapshotLoader, Snapshot, CompanyRecord } from '@regwatch/core';
