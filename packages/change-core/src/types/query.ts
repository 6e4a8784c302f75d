/**
 * Change log query types
 */

import type { ChangeType, StoredChangeEvent } from '@regwatch/core';
import type { ChangeLogSummary } from './summary.js';

export interface ChangeQueryOptions {
  /** Filter by company identifier */
  identifier?: string;
  /** Filter by change type(s) */
  changeType?: ChangeType | ChangeType[];
  /** Filter by state */
  state?: string;
  /** Filter by field label */
  fieldChanged?: string;
  /** Change date from (inclusive) */
  from?: Date;
  /** Change date to (inclusive) */
  to?: Date;
  /** Only events within this many days before `now` */
  days?: number;
  /** Reference time for `days` (default: current time) */
  now?: Date;
  /** Maximum entries to return (default: 100) */
  limit?: number;
  /** Skip first N entries */
  offset?: number;
}

export interface ChangeQueryReport {
  /** Unique report ID */
  id: string;
  /** Report generation timestamp */
  timestamp: Date;
  /** Query options used */
  query: ChangeQueryOptions;
  /** Matching entries, newest change date first */
  entries: StoredChangeEvent[];
  /** Total matches before pagination */
  totalCount: number;
  /** Summary of all matches before pagination */
  summary: ChangeLogSummary;
}

/** Change count for one calendar day */
export interface DailyChangeCount {
  /** YYYY-MM-DD */
  date: string;
  count: number;
}
