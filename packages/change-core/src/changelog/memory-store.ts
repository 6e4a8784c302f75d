/**
 * In-memory Change Log Store
 *
 * Keeps events in process memory. Used for dry runs and tests.
 */

import type { ChangeEvent, StoredChangeEvent } from '@regwatch/core';
import type { AppendResult, IChangeLogStore } from '../interfaces/index.js';

export class MemoryChangeLogStore implements IChangeLogStore {
  private readonly events: StoredChangeEvent[] = [];
  private nextId = 1;

  async append(events: readonly ChangeEvent[]): Promise<AppendResult> {
    const createdAt = new Date();
    for (const event of events) {
      this.events.push({ ...event, id: String(this.nextId++), createdAt });
    }
    return { appended: events.length };
  }

  async readAll(): Promise<StoredChangeEvent[]> {
    return this.events.map((event) => ({ ...event }));
  }

  async close(): Promise<void> {}
}
