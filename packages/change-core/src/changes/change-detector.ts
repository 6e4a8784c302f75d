/**
 * Snapshot Change Detector
 *
 * Compares two registry snapshots keyed by identifier and classifies every
 * identifier as a new incorporation, a deregistration or a set of field
 * updates.
 */

import { randomUUID } from 'node:crypto';
import {
  ALL_FIELDS,
  DEREGISTERED_STATUS,
  RegistryError,
  TRACKED_FIELDS,
  TRACKED_FIELD_LABELS,
  stringifyFieldValue,
} from '@regwatch/core';
import type {
  ChangeEvent,
  CompanyRecord,
  Snapshot,
  TrackedField,
} from '@regwatch/core';
import type { IChangeDetector } from '../interfaces/index.js';
import type {
  ChangeCounts,
  ChangeDetectorOptions,
  ChangeReport,
} from '../types/index.js';

/**
 * Build a map of records keyed by identifier, in row order.
 * Loaders reject duplicates; a snapshot built elsewhere that still repeats an
 * identifier is refused here rather than merged.
 */
function buildRecordMap(snapshot: Snapshot): Map<string, CompanyRecord> {
  const map = new Map<string, CompanyRecord>();

  for (const record of snapshot.records) {
    if (map.has(record.identifier)) {
      throw new RegistryError({
        code: 'DUPLICATE_IDENTIFIER',
        message: `Identifier '${record.identifier}' appears more than once in snapshot`,
        source: snapshot.source,
        suggestion: 'Load the snapshot with a duplicate policy or deduplicate it before comparison.',
        context: { identifier: record.identifier },
      });
    }
    map.set(record.identifier, record);
  }

  return map;
}

function newIncorporation(record: CompanyRecord, date: Date): ChangeEvent {
  return {
    identifier: record.identifier,
    changeType: 'New Incorporation',
    fieldChanged: ALL_FIELDS,
    oldValue: '',
    newValue: record.name,
    date,
    companyName: record.name,
    state: record.state,
    status: record.status,
  };
}

function deregistration(record: CompanyRecord, date: Date): ChangeEvent {
  return {
    identifier: record.identifier,
    changeType: 'Deregistration',
    fieldChanged: TRACKED_FIELD_LABELS.status,
    oldValue: record.status,
    newValue: DEREGISTERED_STATUS,
    date,
    companyName: record.name,
    state: record.state,
    status: DEREGISTERED_STATUS,
  };
}

/**
 * Compare tracked fields of one company across two snapshots.
 *
 * A field counts as changed only when both canonical values are non-empty
 * and differ; transitions to or from an empty value are not reported.
 */
function fieldUpdates(
  previous: CompanyRecord,
  current: CompanyRecord,
  date: Date,
  trackFields: readonly TrackedField[]
): ChangeEvent[] {
  const events: ChangeEvent[] = [];

  for (const field of trackFields) {
    const oldValue = stringifyFieldValue(previous[field]);
    const newValue = stringifyFieldValue(current[field]);

    if (oldValue === newValue || oldValue === '' || newValue === '') continue;

    events.push({
      identifier: current.identifier,
      changeType: 'Field Update',
      fieldChanged: TRACKED_FIELD_LABELS[field],
      oldValue,
      newValue,
      date,
      companyName: current.name,
      state: current.state,
      status: current.status,
    });
  }

  return events;
}

/**
 * Detect changes between two consecutive snapshots.
 *
 * Events come out grouped: new incorporations, then deregistrations, then
 * field updates; within a group they follow snapshot row order.
 *
 * @param previous - Older snapshot, or null/undefined for the first snapshot
 * @param current - Newer snapshot
 * @param changeDate - Date stamped on every event
 */
export function detectChanges(
  previous: Snapshot | null | undefined,
  current: Snapshot,
  changeDate: Date,
  options: ChangeDetectorOptions = {}
): ChangeEvent[] {
  const trackFields = options.trackFields ?? TRACKED_FIELDS;
  const previousMap = previous ? buildRecordMap(previous) : new Map<string, CompanyRecord>();
  const currentMap = buildRecordMap(current);

  const incorporations: ChangeEvent[] = [];
  const updates: ChangeEvent[] = [];

  for (const [identifier, record] of currentMap) {
    const previousRecord = previousMap.get(identifier);
    if (!previousRecord) {
      incorporations.push(newIncorporation(record, changeDate));
    } else {
      updates.push(...fieldUpdates(previousRecord, record, changeDate, trackFields));
    }
  }

  const deregistrations: ChangeEvent[] = [];
  for (const [identifier, record] of previousMap) {
    if (!currentMap.has(identifier)) {
      deregistrations.push(deregistration(record, changeDate));
    }
  }

  return [...incorporations, ...deregistrations, ...updates];
}

/**
 * Count events per change type
 */
export function countChanges(events: readonly ChangeEvent[]): ChangeCounts {
  let newIncorporationCount = 0;
  let deregistrationCount = 0;
  let fieldUpdateCount = 0;

  for (const event of events) {
    switch (event.changeType) {
      case 'New Incorporation':
        newIncorporationCount++;
        break;
      case 'Deregistration':
        deregistrationCount++;
        break;
      case 'Field Update':
        fieldUpdateCount++;
        break;
    }
  }

  return {
    newIncorporationCount,
    deregistrationCount,
    fieldUpdateCount,
    totalChanges: events.length,
  };
}

/**
 * Change Detector Implementation
 *
 * Wraps {@link detectChanges} and reports counts and timing per comparison.
 */
export class ChangeDetector implements IChangeDetector {
  constructor(private readonly options: ChangeDetectorOptions = {}) {}

  detect(
    previous: Snapshot | null | undefined,
    current: Snapshot,
    changeDate: Date
  ): ChangeReport {
    const startTime = Date.now();
    const events = detectChanges(previous, current, changeDate, this.options);

    return {
      id: randomUUID(),
      timestamp: new Date(),
      changeDate,
      previousSource: previous?.source,
      currentSource: current.source,
      counts: countChanges(events),
      events,
      processingTimeMs: Date.now() - startTime,
    };
  }
}
