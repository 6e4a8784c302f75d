/**
 * @regwatch/change-core
 *
 * Snapshot change detection, the multi-snapshot processor and the change log.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Change Detection Module
export {
  ChangeDetector,
  SnapshotProcessor,
  detectChanges,
  countChanges,
  foldSnapshot,
  foldSnapshots,
  initialFoldState,
} from './changes/index.js';
export type { SnapshotFoldState, SnapshotProcessorConfig } from './changes/index.js';

// Change Log Module
export {
  NdjsonChangeLogStore,
  MemoryChangeLogStore,
  ChangeLogQuery,
  summarizeChanges,
} from './changelog/index.js';
export type { ChangeLogReadResult } from './changelog/index.js';

// Formatters
export { formatChangeSummary, formatProcessingResult } from './formatters/index.js';
