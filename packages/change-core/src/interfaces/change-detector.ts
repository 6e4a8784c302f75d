/**
 * Change Detector Interface
 *
 * Interface for comparing two consecutive registry snapshots.
 */

import type { Snapshot } from '@regwatch/core';
import type { ChangeReport } from '../types/index.js';

export interface IChangeDetector {
  /**
   * Compare two snapshots.
   *
   * @param previous - Older snapshot; absent for the first snapshot of a run
   * @param current - Newer snapshot
   * @param changeDate - Date stamped on every event
   * @throws RegistryError (DUPLICATE_IDENTIFIER) if either snapshot repeats an identifier
   */
  detect(
    previous: Snapshot | null | undefined,
    current: Snapshot,
    changeDate: Date
  ): ChangeReport;
}
