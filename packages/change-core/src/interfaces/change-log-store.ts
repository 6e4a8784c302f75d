/**
 * Change Log Store Interface
 *
 * Append-only sink for change events with read-back for reporting.
 */

import type { ChangeEvent, StoredChangeEvent } from '@regwatch/core';

export interface AppendResult {
  /** Number of events written */
  appended: number;
}

/**
 * Change Log Store
 *
 * Implementations create their destination on first use, never deduplicate
 * and never check events against a companies table. Each append stands
 * alone; no transaction spans several appends.
 */
export interface IChangeLogStore {
  /**
   * Append events to durable storage.
   *
   * @throws PersistenceError if the events cannot be written
   */
  append(events: readonly ChangeEvent[]): Promise<AppendResult>;

  /**
   * Read every stored event in insertion order.
   *
   * @throws PersistenceError if the store cannot be read
   */
  readAll(): Promise<StoredChangeEvent[]>;

  /**
   * Release resources held by the store
   */
  close(): Promise<void>;
}
