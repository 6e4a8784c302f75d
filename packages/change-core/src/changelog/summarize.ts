/**
 * Change log summarization
 */

import type { ChangeEvent } from '@regwatch/core';
import type { ChangeLogSummary, CountMap } from '../types/index.js';

/**
 * Count occurrences of a key, sorted by count descending then key ascending
 */
function countBy<T>(items: readonly T[], key: (item: T) => string): CountMap {
  const counts = new Map<string, number>();
  for (const item of items) {
    const value = key(item);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  const sorted = [...counts.entries()].sort(
    ([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : a > b ? 1 : 0)
  );
  return Object.fromEntries(sorted);
}

/**
 * Summarize a change log.
 *
 * Returns counts by change type, field and state plus the change date range,
 * or the `{ empty: true }` sentinel when there are no events.
 */
export function summarizeChanges(events: readonly ChangeEvent[]): ChangeLogSummary {
  const first = events[0];
  if (!first) {
    return { empty: true, totalChanges: 0 };
  }

  let earliest = first.date;
  let latest = first.date;
  for (const event of events) {
    if (event.date < earliest) earliest = event.date;
    if (event.date > latest) latest = event.date;
  }

  return {
    empty: false,
    totalChanges: events.length,
    byChangeType: countBy(events, (e) => e.changeType),
    byFieldChanged: countBy(events, (e) => e.fieldChanged),
    byState: countBy(events, (e) => e.state),
    dateRange: { earliest, latest },
  };
}
