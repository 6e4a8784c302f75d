/**
 * Change Detection Module
 *
 * Exports for detecting registry changes across snapshots.
 */

export { ChangeDetector, detectChanges, countChanges } from './change-detector.js';
export {
  SnapshotProcessor,
  foldSnapshot,
  foldSnapshots,
  initialFoldState,
} from './snapshot-processor.js';
export type { SnapshotFoldState, SnapshotProcessorConfig } from './snapshot-processor.js';
