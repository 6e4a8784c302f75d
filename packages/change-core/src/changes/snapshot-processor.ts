/**
 * Multi-Snapshot Processor
 *
 * Folds the change detector over an ordered sequence of snapshots.
 */

import { LoadError } from '@regwatch/core';
import type { ChangeEvent, ISnapshotLoader, Snapshot } from '@regwatch/core';
import type { IChangeDetector, ILogger } from '../interfaces/index.js';
import type {
  ChangeReport,
  ProcessingResult,
  SkippedSnapshot,
  SnapshotSource,
} from '../types/index.js';
import { ChangeDetector } from './change-detector.js';

/** Accumulator threaded through the fold */
export interface SnapshotFoldState {
  /** Last successfully loaded snapshot */
  previous: Snapshot | null;
  events: ChangeEvent[];
  reports: ChangeReport[];
}

export function initialFoldState(): SnapshotFoldState {
  return { previous: null, events: [], reports: [] };
}

/**
 * Advance the fold by one snapshot.
 *
 * With a previous snapshot, runs one detection round using the new
 * snapshot's date as the change date. The new snapshot always becomes the
 * next `previous`. Events and reports are appended to the accumulator's
 * arrays in place.
 */
export function foldSnapshot(
  state: SnapshotFoldState,
  snapshot: Snapshot,
  detector: IChangeDetector
): SnapshotFoldState {
  if (state.previous) {
    const report = detector.detect(state.previous, snapshot, snapshot.snapshotDate);
    for (const event of report.events) state.events.push(event);
    state.reports.push(report);
  }

  state.previous = snapshot;
  return state;
}

/**
 * Fold the detector over already-loaded snapshots, oldest first.
 * N snapshots give N-1 rounds; zero or one snapshot gives no events.
 */
export function foldSnapshots(
  snapshots: readonly Snapshot[],
  detector: IChangeDetector = new ChangeDetector()
): Pick<ProcessingResult, 'events' | 'reports' | 'rounds'> {
  const state = snapshots.reduce(
    (acc, snapshot) => foldSnapshot(acc, snapshot, detector),
    initialFoldState()
  );

  return {
    events: state.events,
    reports: state.reports,
    rounds: state.reports.length,
  };
}

export interface SnapshotProcessorConfig {
  /** Loads each snapshot source */
  loader: ISnapshotLoader;
  /** Detector used for each round (default: all tracked fields) */
  detector?: IChangeDetector;
  /**
   * Skip sources that fail to load instead of aborting the run.
   * A skipped source never becomes `previous`. Default: true.
   */
  skipUnreadableSnapshots?: boolean;
  logger?: ILogger;
}

/**
 * Loads snapshot sources one at a time and compares each against the last
 * successfully loaded one.
 */
export class SnapshotProcessor {
  private readonly detector: IChangeDetector;
  private readonly skipUnreadable: boolean;

  constructor(private readonly config: SnapshotProcessorConfig) {
    this.detector = config.detector ?? new ChangeDetector();
    this.skipUnreadable = config.skipUnreadableSnapshots ?? true;
  }

  /**
   * Process snapshot sources in the given (strictly increasing date) order.
   *
   * @throws LoadError when a source fails and skipping is disabled
   */
  async process(sources: readonly SnapshotSource[]): Promise<ProcessingResult> {
    const logger = this.config.logger;
    let state = initialFoldState();
    const loaded: string[] = [];
    const skipped: SkippedSnapshot[] = [];

    logger?.info('Starting change detection', { snapshots: sources.length });

    for (const [index, entry] of sources.entries()) {
      const source = typeof entry === 'string' ? entry : entry.path;
      const snapshotDate = typeof entry === 'string' ? undefined : entry.snapshotDate;
      logger?.info(`Processing snapshot ${index + 1}: ${source}`);

      let snapshot: Snapshot;
      try {
        snapshot = await this.config.loader.load(source, { snapshotDate });
      } catch (err) {
        if (err instanceof LoadError && this.skipUnreadable) {
          if (err.code === 'MISSING_SNAPSHOT_DATE') {
            // Usually a file with a header and no rows
            logger?.warn(`Skipping undated snapshot ${source}; give it a snapshotDate to compare it`, {
              code: err.code,
              error: err.message,
            });
          } else {
            logger?.warn(`Skipping unreadable snapshot ${source}`, {
              code: err.code,
              error: err.message,
            });
          }
          skipped.push({ source, code: err.code, message: err.message });
          continue;
        }
        throw err;
      }

      logger?.debug('Loaded snapshot', {
        source,
        records: snapshot.records.length,
        snapshotDate: snapshot.snapshotDate.toISOString(),
      });

      const hadPrevious = state.previous !== null;
      state = foldSnapshot(state, { ...snapshot, source: snapshot.source ?? source }, this.detector);
      loaded.push(source);

      if (hadPrevious) {
        const report = state.reports[state.reports.length - 1];
        logger?.info(
          `Detected ${report?.counts.totalChanges ?? 0} changes in snapshot ${index + 1}`,
          report ? { ...report.counts } : undefined
        );
      }
    }

    logger?.info(`Total changes detected: ${state.events.length}`, {
      rounds: state.reports.length,
      skipped: skipped.length,
    });

    return {
      events: state.events,
      reports: state.reports,
      rounds: state.reports.length,
      loaded,
      skipped,
    };
  }
}
