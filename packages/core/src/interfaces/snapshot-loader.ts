/**
 * Snapshot Loader Interface
 *
 * Implemented by every source of registry snapshots (CSV, JSON, consolidated
 * master tables).
 */

import type { Snapshot } from '../types/index.js';

export interface SnapshotLoadOptions {
  /** Observation date for this source, used when its rows carry none */
  snapshotDate?: Date;
}

export interface ISnapshotLoader {
  /**
   * Load one snapshot from a source.
   *
   * @param source - File path (or loader-specific source label)
   * @throws LoadError if the source is unreadable or malformed
   */
  load(source: string, options?: SnapshotLoadOptions): Promise<Snapshot>;
}
