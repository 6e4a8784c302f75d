/**
 * Change Log Query Engine
 *
 * Filters and queries stored change events for the reporting layer.
 */

import { randomUUID } from 'node:crypto';
import { formatDateKey } from '@regwatch/core';
import type { StoredChangeEvent } from '@regwatch/core';
import type { IChangeLogStore } from '../interfaces/index.js';
import type {
  ChangeQueryOptions,
  ChangeQueryReport,
  DailyChangeCount,
} from '../types/index.js';
import { summarizeChanges } from './summarize.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Handles filtering and querying of change log entries.
 */
export class ChangeLogQuery {
  constructor(private readonly store: IChangeLogStore) {}

  /**
   * Execute a query against the change log.
   */
  async execute(options: ChangeQueryOptions = {}): Promise<ChangeQueryReport> {
    const now = options.now ?? new Date();
    const entries = this.applyFilters(await this.store.readAll(), options, now);

    // Newest change date first; stable for events sharing a date
    entries.sort((a, b) => b.date.getTime() - a.date.getTime());

    // Calculate summary before pagination
    const summary = summarizeChanges(entries);
    const totalCount = entries.length;

    const offset = options.offset ?? 0;
    const limit = options.limit ?? 100;

    return {
      id: randomUUID(),
      timestamp: now,
      query: options,
      entries: entries.slice(offset, offset + limit),
      totalCount,
      summary,
    };
  }

  /**
   * All events for one company, newest first
   */
  async companyHistory(identifier: string): Promise<StoredChangeEvent[]> {
    const report = await this.execute({ identifier, limit: Number.MAX_SAFE_INTEGER });
    return report.entries;
  }

  /**
   * Event counts per change date, oldest day first
   */
  async dailyTrend(options: ChangeQueryOptions = {}): Promise<DailyChangeCount[]> {
    const entries = this.applyFilters(
      await this.store.readAll(),
      options,
      options.now ?? new Date()
    );

    const counts = new Map<string, number>();
    for (const entry of entries) {
      const key = formatDateKey(entry.date);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    return [...counts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([date, count]) => ({ date, count }));
  }

  /**
   * Apply query filters to entries
   */
  private applyFilters(
    entries: StoredChangeEvent[],
    options: ChangeQueryOptions,
    now: Date
  ): StoredChangeEvent[] {
    const since =
      options.days !== undefined ? new Date(now.getTime() - options.days * DAY_MS) : undefined;

    return entries.filter((entry) => {
      if (options.changeType) {
        const types = Array.isArray(options.changeType)
          ? options.changeType
          : [options.changeType];
        if (!types.includes(entry.changeType)) {
          return false;
        }
      }

      if (options.identifier !== undefined && entry.identifier !== options.identifier) {
        return false;
      }

      if (options.state !== undefined && entry.state !== options.state) {
        return false;
      }

      if (options.fieldChanged !== undefined && entry.fieldChanged !== options.fieldChanged) {
        return false;
      }

      if (options.from && entry.date < options.from) return false;
      if (options.to && entry.date > options.to) return false;
      if (since && entry.date < since) return false;

      return true;
    });
  }
}
