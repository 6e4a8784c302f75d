/**
 * Change log summary types
 */

/** Count per distinct value, sorted by count descending then value */
export type CountMap = Record<string, number>;

export interface ChangeSummary {
  empty: false;
  totalChanges: number;
  byChangeType: CountMap;
  byFieldChanged: CountMap;
  byState: CountMap;
  dateRange: {
    earliest: Date;
    latest: Date;
  };
}

/** Sentinel returned for a change log with zero events */
export interface EmptyChangeSummary {
  empty: true;
  totalChanges: 0;
}

export type ChangeLogSummary = ChangeSummary | EmptyChangeSummary;
