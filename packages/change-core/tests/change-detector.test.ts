import { describe, expect, it } from 'vitest';
import { RegistryError } from '@regwatch/core';
import type { ChangeEvent } from '@regwatch/core';
import { ChangeDetector, countChanges, detectChanges } from '../src/changes/change-detector.js';
import { DAY1, DAY2, company, snapshot } from './fixtures.js';

function byType(events: ChangeEvent[], type: ChangeEvent['changeType']): ChangeEvent[] {
  return events.filter((e) => e.changeType === type);
}

describe('detectChanges', () => {
  it('reports a status edit and a new company', () => {
    const previous = snapshot(DAY1, [company('id1', { name: 'Alpha', status: 'Active' })]);
    const current = snapshot(DAY2, [
      company('id1', { name: 'Alpha', status: 'Strike Off' }),
      company('id2', { name: 'Beta' }),
    ]);

    const events = detectChanges(previous, current, DAY2);

    expect(events).toHaveLength(2);
    expect(events).toContainEqual({
      identifier: 'id1',
      changeType: 'Field Update',
      fieldChanged: 'Status',
      oldValue: 'Active',
      newValue: 'Strike Off',
      date: DAY2,
      companyName: 'Alpha',
      state: 'Maharashtra',
      status: 'Strike Off',
    });
    expect(events).toContainEqual({
      identifier: 'id2',
      changeType: 'New Incorporation',
      fieldChanged: 'All',
      oldValue: '',
      newValue: 'Beta',
      date: DAY2,
      companyName: 'Beta',
      state: 'Maharashtra',
      status: 'Active',
    });
  });

  it('reports a company missing from the newer snapshot as deregistered', () => {
    const previous = snapshot(DAY1, [company('id1', { name: 'Alpha', status: 'Active' })]);
    const current = snapshot(DAY2, []);

    const events = detectChanges(previous, current, DAY2);

    expect(events).toEqual([
      {
        identifier: 'id1',
        changeType: 'Deregistration',
        fieldChanged: 'Status',
        oldValue: 'Active',
        newValue: 'Deregistered',
        date: DAY2,
        companyName: 'Alpha',
        state: 'Maharashtra',
        status: 'Deregistered',
      },
    ]);
  });

  it('treats every company as new when there is no previous snapshot', () => {
    const current = snapshot(DAY1, [company('id1'), company('id2')]);

    for (const previous of [null, undefined]) {
      const events = detectChanges(previous, current, DAY1);
      expect(byType(events, 'New Incorporation').map((e) => e.identifier)).toEqual(['id1', 'id2']);
      expect(byType(events, 'Deregistration')).toHaveLength(0);
      expect(byType(events, 'Field Update')).toHaveLength(0);
    }
  });

  it('does not report a field going from empty to populated', () => {
    const previous = snapshot(DAY1, [company('id1', { authorizedCapital: null })]);
    const current = snapshot(DAY2, [company('id1', { authorizedCapital: 500000 })]);

    expect(detectChanges(previous, current, DAY2)).toEqual([]);
  });

  it('does not report a field going from populated to empty', () => {
    const previous = snapshot(DAY1, [company('id1', { address: '2 Old Street' })]);
    const current = snapshot(DAY2, [company('id1', { address: '  ' })]);

    expect(detectChanges(previous, current, DAY2)).toEqual([]);
  });

  it('emits one event per changed field with identity from the newer record', () => {
    const previous = snapshot(DAY1, [
      company('id1', {
        name: 'OLD NAME',
        state: 'Gujarat',
        authorizedCapital: 100000,
        paidupCapital: 10000,
        address: 'Old Address',
        industryClassification: 'Trading',
      }),
    ]);
    const current = snapshot(DAY2, [
      company('id1', {
        name: 'NEW NAME',
        state: 'Delhi',
        authorizedCapital: 200000,
        paidupCapital: 20000,
        address: 'New Address',
        industryClassification: 'Services',
      }),
    ]);

    const events = detectChanges(previous, current, DAY2);

    expect(events.map((e) => [e.fieldChanged, e.oldValue, e.newValue])).toEqual([
      ['Authorized_Capital', '100000', '200000'],
      ['Paidup_Capital', '10000', '20000'],
      ['Company_Name', 'OLD NAME', 'NEW NAME'],
      ['Address', 'Old Address', 'New Address'],
      ['Industry_Classification', 'Trading', 'Services'],
    ]);
    expect(new Set(events.map((e) => e.companyName))).toEqual(new Set(['NEW NAME']));
    expect(new Set(events.map((e) => e.state))).toEqual(new Set(['Delhi']));
  });

  it('does not report a state change because state is not tracked', () => {
    const previous = snapshot(DAY1, [company('id1', { state: 'Gujarat' })]);
    const current = snapshot(DAY2, [company('id1', { state: 'Delhi' })]);

    expect(detectChanges(previous, current, DAY2)).toEqual([]);
  });

  it('yields no events for identical snapshots', () => {
    const records = [company('id1'), company('id2', { paidupCapital: null }), company('id3')];
    const s = snapshot(DAY1, records);

    expect(detectChanges(s, s, DAY1)).toEqual([]);
  });

  it('compares capitals by canonical string', () => {
    const previous = snapshot(DAY1, [company('id1', { authorizedCapital: 500000.0 })]);
    const current = snapshot(DAY2, [company('id1', { authorizedCapital: 500000 })]);

    expect(detectChanges(previous, current, DAY2)).toEqual([]);
  });

  it('partitions identifiers into exactly one category', () => {
    const previous = snapshot(DAY1, [
      company('a'),
      company('b', { status: 'Active' }),
      company('c'),
      company('d'),
    ]);
    const current = snapshot(DAY2, [
      company('b', { status: 'Dormant' }),
      company('c'),
      company('e'),
      company('f'),
    ]);

    const events = detectChanges(previous, current, DAY2);
    const newIds = new Set(byType(events, 'New Incorporation').map((e) => e.identifier));
    const goneIds = new Set(byType(events, 'Deregistration').map((e) => e.identifier));
    const updatedIds = new Set(byType(events, 'Field Update').map((e) => e.identifier));

    expect(newIds).toEqual(new Set(['e', 'f']));
    expect(goneIds).toEqual(new Set(['a', 'd']));
    expect(updatedIds).toEqual(new Set(['b']));
    expect(events.map((e) => e.changeType)).toEqual([
      'New Incorporation',
      'New Incorporation',
      'Deregistration',
      'Deregistration',
      'Field Update',
    ]);
  });

  it('restricts field updates to the given tracked fields', () => {
    const previous = snapshot(DAY1, [company('id1', { status: 'Active', name: 'A' })]);
    const current = snapshot(DAY2, [company('id1', { status: 'Dormant', name: 'B' })]);

    const events = detectChanges(previous, current, DAY2, { trackFields: ['name'] });

    expect(events.map((e) => e.fieldChanged)).toEqual(['Company_Name']);
  });

  it('refuses snapshots that repeat an identifier', () => {
    const current = snapshot(DAY2, [company('id1'), company('id1')], 'day2.csv');

    expect(() => detectChanges(null, current, DAY2)).toThrow(RegistryError);
    expect(() => detectChanges(null, current, DAY2)).toThrow(
      expect.objectContaining({ code: 'DUPLICATE_IDENTIFIER', source: 'day2.csv' })
    );
  });
});

describe('countChanges', () => {
  it('counts each category', () => {
    const previous = snapshot(DAY1, [company('a'), company('b', { status: 'Active' })]);
    const current = snapshot(DAY2, [company('b', { status: 'Dormant' }), company('c'), company('d')]);

    expect(countChanges(detectChanges(previous, current, DAY2))).toEqual({
      newIncorporationCount: 2,
      deregistrationCount: 1,
      fieldUpdateCount: 1,
      totalChanges: 4,
    });
  });
});

describe('ChangeDetector', () => {
  it('reports counts and sources for one comparison', () => {
    const detector = new ChangeDetector();
    const previous = snapshot(DAY1, [company('a')], 'day1.csv');
    const current = snapshot(DAY2, [company('a'), company('b')], 'day2.csv');

    const report = detector.detect(previous, current, DAY2);

    expect(report.changeDate).toBe(DAY2);
    expect(report.previousSource).toBe('day1.csv');
    expect(report.currentSource).toBe('day2.csv');
    expect(report.counts.newIncorporationCount).toBe(1);
    expect(report.counts.totalChanges).toBe(1);
    expect(report.events[0]?.identifier).toBe('b');
    expect(report.processingTimeMs).toBeGreaterThanOrEqual(0);
  });
});
