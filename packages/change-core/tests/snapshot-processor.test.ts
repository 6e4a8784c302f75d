import { describe, expect, it, vi } from 'vitest';
import { LoadError } from '@regwatch/core';
import type { ISnapshotLoader, Snapshot, SnapshotLoadOptions } from '@regwatch/core';
import { ChangeDetector, detectChanges } from '../src/changes/change-detector.js';
import {
  SnapshotProcessor,
  foldSnapshot,
  foldSnapshots,
  initialFoldState,
} from '../src/changes/snapshot-processor.js';
import type { ILogger } from '../src/interfaces/index.js';
import { DAY1, DAY2, DAY3, company, snapshot } from './fixtures.js';

class MapLoader implements ISnapshotLoader {
  readonly loadedSources: string[] = [];
  readonly loadDates: Array<Date | undefined> = [];

  constructor(private readonly snapshots: Record<string, Snapshot | Error>) {}

  async load(source: string, options?: SnapshotLoadOptions): Promise<Snapshot> {
    this.loadedSources.push(source);
    this.loadDates.push(options?.snapshotDate);
    const entry = this.snapshots[source];
    if (entry === undefined) {
      throw new LoadError({ code: 'NOT_FOUND', message: `File not found: ${source}`, source });
    }
    if (entry instanceof Error) throw entry;
    return entry;
  }
}

function silentLogger(): ILogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const s1 = snapshot(DAY1, [company('a', { status: 'Active' }), company('b')]);
const s2 = snapshot(DAY2, [company('a', { status: 'Dormant' }), company('c')]);
const s3 = snapshot(DAY3, [company('a', { status: 'Strike Off' }), company('c'), company('d')]);

const detector = new ChangeDetector();

describe('foldSnapshots', () => {
  it('yields no events for zero or one snapshot', () => {
    expect(foldSnapshots([])).toEqual({ events: [], reports: [], rounds: 0 });
    expect(foldSnapshots([s1]).events).toEqual([]);
    expect(foldSnapshots([s1]).rounds).toBe(0);
  });

  it('runs N-1 rounds and matches pairwise detection in order', () => {
    const result = foldSnapshots([s1, s2, s3]);

    expect(result.rounds).toBe(2);
    expect(result.events).toEqual([
      ...detectChanges(s1, s2, DAY2),
      ...detectChanges(s2, s3, DAY3),
    ]);
  });

  it('appends to the accumulator instead of copying it each round', () => {
    const state = initialFoldState();
    const { events, reports } = state;

    const next = foldSnapshot(foldSnapshot(foldSnapshot(state, s1, detector), s2, detector), s3, detector);

    expect(next.events).toBe(events);
    expect(next.reports).toBe(reports);
    expect(next.previous).toBe(s3);
    expect(events).toEqual(foldSnapshots([s1, s2, s3]).events);
  });

  it("stamps each round with the newer snapshot's date", () => {
    const result = foldSnapshots([s1, s2, s3]);

    expect(result.reports.map((r) => r.changeDate)).toEqual([DAY2, DAY3]);
    expect(new Set(result.events.map((e) => e.date.toISOString()))).toEqual(
      new Set([DAY2.toISOString(), DAY3.toISOString()])
    );
  });
});

describe('SnapshotProcessor', () => {
  it('compares the surrounding snapshots when a middle one fails to load', async () => {
    const loader = new MapLoader({ 'day1.csv': s1, 'day3.csv': s3 });
    const logger = silentLogger();
    const processor = new SnapshotProcessor({ loader, logger });

    const result = await processor.process(['day1.csv', 'day2.csv', 'day3.csv']);

    expect(result.rounds).toBe(1);
    expect(result.loaded).toEqual(['day1.csv', 'day3.csv']);
    expect(result.skipped).toEqual([
      { source: 'day2.csv', code: 'NOT_FOUND', message: 'File not found: day2.csv' },
    ]);
    expect(result.events).toEqual(detectChanges(s1, s3, DAY3));
    expect(result.reports[0]?.previousSource).toBe('day1.csv');
    expect(result.reports[0]?.currentSource).toBe('day3.csv');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('fails fast when skipping is disabled', async () => {
    const loader = new MapLoader({ 'day1.csv': s1, 'day3.csv': s3 });
    const processor = new SnapshotProcessor({ loader, skipUnreadableSnapshots: false });

    await expect(processor.process(['day1.csv', 'day2.csv', 'day3.csv'])).rejects.toBeInstanceOf(
      LoadError
    );
    expect(loader.loadedSources).toEqual(['day1.csv', 'day2.csv']);
  });

  it('propagates failures that are not load errors', async () => {
    const loader = new MapLoader({ 'day1.csv': s1, 'day2.csv': new TypeError('bug') });
    const processor = new SnapshotProcessor({ loader });

    await expect(processor.process(['day1.csv', 'day2.csv'])).rejects.toBeInstanceOf(TypeError);
  });

  it('returns zero events when every source fails', async () => {
    const processor = new SnapshotProcessor({ loader: new MapLoader({}), logger: silentLogger() });

    const result = await processor.process(['a.csv', 'b.csv']);

    expect(result.events).toEqual([]);
    expect(result.rounds).toBe(0);
    expect(result.skipped.map((s) => s.source)).toEqual(['a.csv', 'b.csv']);
  });

  it('loads sources strictly in order', async () => {
    const loader = new MapLoader({ 'day1.csv': s1, 'day2.csv': s2, 'day3.csv': s3 });
    const processor = new SnapshotProcessor({ loader });

    const result = await processor.process(['day1.csv', 'day2.csv', 'day3.csv']);

    expect(loader.loadedSources).toEqual(['day1.csv', 'day2.csv', 'day3.csv']);
    expect(result.events).toEqual(foldSnapshots([s1, s2, s3]).events);
  });

  it('passes a configured snapshot date to the loader', async () => {
    const loader = new MapLoader({ 'day1.csv': s1, 'day2.csv': s2 });
    const processor = new SnapshotProcessor({ loader });

    await processor.process(['day1.csv', { path: 'day2.csv', snapshotDate: DAY2 }]);

    expect(loader.loadedSources).toEqual(['day1.csv', 'day2.csv']);
    expect(loader.loadDates).toEqual([undefined, DAY2]);
  });

  it('warns separately about snapshots without a date', async () => {
    const undated = new LoadError({
      code: 'MISSING_SNAPSHOT_DATE',
      message: 'No snapshot date for day2.csv',
      source: 'day2.csv',
    });
    const loader = new MapLoader({ 'day1.csv': s1, 'day2.csv': undated });
    const logger = silentLogger();
    const processor = new SnapshotProcessor({ loader, logger });

    const result = await processor.process(['day1.csv', 'day2.csv']);

    expect(result.skipped).toEqual([
      { source: 'day2.csv', code: 'MISSING_SNAPSHOT_DATE', message: 'No snapshot date for day2.csv' },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping undated snapshot day2.csv; give it a snapshotDate to compare it',
      { code: 'MISSING_SNAPSHOT_DATE', error: 'No snapshot date for day2.csv' }
    );
  });
});
