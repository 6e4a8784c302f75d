/**
 * Type exports for change-core
 */

export type {
  ChangeCounts,
  ChangeReport,
  ChangeDetectorOptions,
  SkippedSnapshot,
  SnapshotSource,
  ProcessingResult,
} from './changes.js';

export type {
  CountMap,
  ChangeSummary,
  EmptyChangeSummary,
  ChangeLogSummary,
} from './summary.js';

export type {
  ChangeQueryOptions,
  ChangeQueryReport,
  DailyChangeCount,
} from './query.js';
