import { afterEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PersistenceError } from '@regwatch/core';
import type { ILogger } from '@regwatch/core';
import { MemoryChangeLogStore } from '@regwatch/change-core';
import { parseConfig } from '../src/config.js';
import { runPipeline } from '../src/pipeline.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

const NOW = new Date(Date.UTC(2025, 9, 18, 12, 0, 0));

function workDir(): string {
  if (!tmpDir) tmpDir = mkdtempSync(join(tmpdir(), 'regwatch-pipeline-'));
  return tmpDir;
}

function writeFile(name: string, content: string): string {
  const filePath = join(workDir(), name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

function writeSnapshots(): { day1: string; day2: string } {
  const header = 'CIN,Company_Name,State,Status,snapshot_date\n';
  return {
    day1: writeFile(
      'snapshot_day1.csv',
      `${header}U1,Alpha,Delhi,Active,2025-10-17\nU2,Beta,Delhi,Active,2025-10-17\n`
    ),
    day2: writeFile(
      'snapshot_day2.csv',
      `${header}U1,Alpha,Delhi,Strike Off,2025-10-18\nU3,Gamma,Delhi,Active,2025-10-18\n`
    ),
  };
}

function silentLogger(): ILogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('runPipeline', () => {
  it('detects, stores and exports changes', async () => {
    const { day1, day2 } = writeSnapshots();
    const exportDir = join(workDir(), 'exports');
    const config = parseConfig(
      { snapshots: [day1, day2], export: { dir: exportDir, formats: ['csv', 'json'] } },
      { env: {} }
    );
    const store = new MemoryChangeLogStore();

    const result = await runPipeline(config, 'changes', {
      store,
      logger: silentLogger(),
      now: () => NOW,
    });

    expect(result.outcome).toBe('changes-detected');
    expect(result.appended).toBe(3);
    expect(result.processing?.rounds).toBe(1);
    expect(result.exports).toEqual([
      join(exportDir, 'change_logs_20251018_120000.csv'),
      join(exportDir, 'change_logs_20251018_120000.json'),
    ]);

    const stored = await store.readAll();
    expect(stored.map((e) => [e.identifier, e.changeType, e.fieldChanged])).toEqual([
      ['U3', 'New Incorporation', expect.any(String)],
      ['U2', 'Deregistration', 'Status'],
      ['U1', 'Field Update', 'Status'],
    ]);

    const exported: unknown = JSON.parse(
      readFileSync(join(exportDir, 'change_logs_20251018_120000.json'), 'utf-8')
    );
    expect(exported).toHaveLength(3);
    expect(exported).toContainEqual(
      expect.objectContaining({ identifier: 'U1', old_value: 'Active', new_value: 'Strike Off' })
    );

    const csvHeader = readFileSync(join(exportDir, 'change_logs_20251018_120000.csv'), 'utf-8').split('\n')[0];
    expect(csvHeader).toBe(
      'identifier,change_type,field_changed,old_value,new_value,date,company_name,state,status'
    );
  });

  it('reports no changes for identical snapshots', async () => {
    const header = 'CIN,Company_Name,State,Status,snapshot_date\n';
    const day1 = writeFile('a.csv', `${header}U1,Alpha,Delhi,Active,2025-10-17\n`);
    const day2 = writeFile('b.csv', `${header}U1,Alpha,Delhi,Active,2025-10-18\n`);
    const config = parseConfig({ snapshots: [day1, day2] }, { env: {} });

    const result = await runPipeline(config, 'changes', {
      store: new MemoryChangeLogStore(),
      logger: silentLogger(),
    });

    expect(result.outcome).toBe('no-changes');
    expect(result.appended).toBe(0);
    expect(result.exports).toEqual([]);
  });

  it('fails the run on an unreadable snapshot when skipping is disabled', async () => {
    const { day1 } = writeSnapshots();
    const config = parseConfig(
      {
        snapshots: [day1, join(workDir(), 'missing.csv')],
        processing: { skipUnreadableSnapshots: false },
      },
      { env: {} }
    );
    const logger = silentLogger();

    const result = await runPipeline(config, 'changes', { store: new MemoryChangeLogStore(), logger });

    expect(result.outcome).toBe('failed');
    expect(result.error?.code).toBe('NOT_FOUND');
    expect(result.report.startsWith('## Run failed: changes\n')).toBe(true);
    expect(result.steps).toEqual([{ step: 'changes', ok: false, code: 'NOT_FOUND' }]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('skips an unreadable snapshot by default', async () => {
    const { day1, day2 } = writeSnapshots();
    const missing = join(workDir(), 'missing.csv');
    const config = parseConfig({ snapshots: [day1, missing, day2] }, { env: {} });

    const result = await runPipeline(config, 'changes', {
      store: new MemoryChangeLogStore(),
      logger: silentLogger(),
    });

    expect(result.outcome).toBe('changes-detected');
    expect(result.processing?.skipped).toEqual([
      { source: missing, code: 'NOT_FOUND', message: `File not found: ${missing}` },
    ]);
    expect(result.appended).toBe(3);
  });

  it('requires a consolidation section in full mode', async () => {
    const config = parseConfig({}, { env: {} });

    const result = await runPipeline(config, 'full', {
      store: new MemoryChangeLogStore(),
      logger: silentLogger(),
    });

    expect(result.outcome).toBe('failed');
    expect(result.error?.code).toBe('CONFIGURATION_ERROR');
    expect(result.steps).toEqual([
      { step: 'consolidation', ok: false, code: 'CONFIGURATION_ERROR' },
      { step: 'changes', ok: true },
    ]);
  });

  it('still detects and stores changes in full mode when consolidation fails', async () => {
    const { day1, day2 } = writeSnapshots();
    const config = parseConfig(
      {
        consolidation: { states: [{ state: 'goa', filePath: join(workDir(), 'goa.csv') }] },
        snapshots: [day1, day2],
      },
      { env: {} }
    );
    const store = new MemoryChangeLogStore();

    const result = await runPipeline(config, 'full', { store, logger: silentLogger(), now: () => NOW });

    expect(result.outcome).toBe('failed');
    expect(result.error?.code).toBe('NO_DATA');
    expect(result.steps).toEqual([
      { step: 'consolidation', ok: false, code: 'NO_DATA' },
      { step: 'changes', ok: true },
    ]);
    expect(result.appended).toBe(3);
    expect(await store.readAll()).toHaveLength(3);
    expect(result.report.startsWith('## Run failed: consolidation\n')).toBe(true);
  });

  it('fails the run when the change log cannot be written', async () => {
    const { day1, day2 } = writeSnapshots();
    const config = parseConfig({ snapshots: [day1, day2] }, { env: {} });
    const store = new MemoryChangeLogStore();
    vi.spyOn(store, 'append').mockRejectedValue(
      new PersistenceError({ code: 'WRITE_FAILED', message: 'disk full' })
    );

    const result = await runPipeline(config, 'changes', { store, logger: silentLogger() });

    expect(result.outcome).toBe('failed');
    expect(result.error).toBeInstanceOf(PersistenceError);
    expect(result.error?.code).toBe('WRITE_FAILED');
    expect(result.appended).toBe(0);
    expect(result.summary?.totalChanges).toBe(3);
  });

  it('writes the master table in consolidate mode', async () => {
    const delhi = writeFile('delhi.csv', 'CIN,Company_Name,Status\nU1,Alpha,Active\nU2,Beta,Active\n');
    const outputPath = join(workDir(), 'out', 'consolidated.csv');
    const config = parseConfig(
      {
        consolidation: {
          states: [{ state: 'delhi', filePath: delhi }],
          outputPath,
          snapshotDate: '2025-10-18',
        },
      },
      { env: {} }
    );
    const store = new MemoryChangeLogStore();

    const result = await runPipeline(config, 'consolidate', { store, logger: silentLogger() });

    expect(result.outcome).toBe('no-changes');
    expect(result.masterTable).toEqual({
      totalCompanies: 2,
      byState: { Delhi: 2 },
      byStatus: { Active: 2 },
    });
    expect(existsSync(outputPath)).toBe(true);
    expect(readFileSync(outputPath, 'utf-8').split('\n')[0]).toBe(
      'CIN,Company_Name,State,Status,Authorized_Capital,Paidup_Capital,Address,Industry_Classification,snapshot_date'
    );
    expect(await store.readAll()).toEqual([]);
  });

  it('summarizes an empty change log', async () => {
    const config = parseConfig({}, { env: {} });

    const result = await runPipeline(config, 'summary', {
      store: new MemoryChangeLogStore(),
      logger: silentLogger(),
    });

    expect(result.outcome).toBe('no-changes');
    expect(result.report).toBe('## Change Detection Summary\nNo changes detected.');
  });
});
