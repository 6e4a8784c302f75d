/**
 * NDJSON Change Log Store
 *
 * Append-only storage for change events.
 * Stores events in newline-delimited JSON files organized by change date.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  PersistenceError,
  formatDateKey,
  storedChangeEventSchema,
} from '@regwatch/core';
import type { ChangeEvent, StoredChangeEvent } from '@regwatch/core';
import type { AppendResult, IChangeLogStore } from '../interfaces/index.js';

const FILE_PATTERN = /^\d{4}-\d{2}-\d{2}\.ndjson$/;

/** Stored line: the event plus its position among lines written at the same instant */
const changeLogLineSchema = storedChangeEventSchema.extend({
  seq: z.number().int().nonnegative().default(0),
});

interface SequencedEvent {
  event: StoredChangeEvent;
  seq: number;
}

export interface ChangeLogReadResult {
  events: StoredChangeEvent[];
  /** Lines that could not be parsed as change events */
  skippedLines: number;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Manages change log storage on the filesystem.
 *
 * Format: {baseDir}/{YYYY-MM-DD}.ndjson, one JSON object per line, where the
 * date is the event's change date. The directory is created on first append.
 * Lines carry `createdAt` and a sequence number; reads order by both, which
 * restores insertion order across date files.
 */
export class NdjsonChangeLogStore implements IChangeLogStore {
  private static writeQueue = new Map<string, Promise<void>>();
  private static nextSeq = 0;

  private readonly baseDir: string;

  constructor(baseDir: string = './.change-log') {
    this.baseDir = path.resolve(baseDir);
  }

  /**
   * Get the file path for a change date
   */
  private getFilePath(date: Date): string {
    return path.join(this.baseDir, `${formatDateKey(date)}.ndjson`);
  }

  /**
   * Ensure the log directory exists
   */
  private async ensureDir(): Promise<void> {
    try {
      await fs.mkdir(this.baseDir, { recursive: true, mode: 0o700 });
    } catch (err) {
      throw new PersistenceError({
        code: 'WRITE_FAILED',
        message: `Failed to create change log directory: ${this.baseDir}`,
        source: this.baseDir,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  /**
   * Append events to the change log
   */
  async append(events: readonly ChangeEvent[]): Promise<AppendResult> {
    if (events.length === 0) return { appended: 0 };

    await this.ensureDir();

    const createdAt = new Date();
    const linesByFile = new Map<string, string[]>();
    for (const event of events) {
      const stored: StoredChangeEvent = { ...event, id: randomUUID(), createdAt };
      const seq = NdjsonChangeLogStore.nextSeq++;
      const filePath = this.getFilePath(event.date);
      const lines = linesByFile.get(filePath) ?? [];
      lines.push(`${JSON.stringify({ ...stored, seq })}\n`);
      linesByFile.set(filePath, lines);
    }

    for (const [filePath, lines] of linesByFile) {
      try {
        await this.enqueueWrite(filePath, async () => {
          await fs.appendFile(filePath, lines.join(''), { encoding: 'utf-8', mode: 0o600 });
        });
      } catch (err) {
        throw new PersistenceError({
          code: 'WRITE_FAILED',
          message: `Failed to write change log entries to ${filePath}`,
          source: filePath,
          cause: err instanceof Error ? err : undefined,
        });
      }
    }

    return { appended: events.length };
  }

  /**
   * Read all events in insertion order
   */
  async readAll(): Promise<StoredChangeEvent[]> {
    const { events } = await this.readAllWithStats();
    return events;
  }

  /**
   * Read all events, reporting how many lines were unreadable
   */
  async readAllWithStats(): Promise<ChangeLogReadResult> {
    const files = await this.listFiles();
    return this.readFiles(files);
  }

  /**
   * Read events whose change date falls within [from, to]
   */
  async readRange(from: Date, to: Date): Promise<StoredChangeEvent[]> {
    const fromKey = formatDateKey(from);
    const toKey = formatDateKey(to);
    const files = (await this.listFiles()).filter((file) => {
      const key = file.replace(/\.ndjson$/, '');
      return key >= fromKey && key <= toKey;
    });

    const { events } = await this.readFiles(files);
    return events.filter((e) => e.date >= from && e.date <= to);
  }

  /**
   * Wait for pending writes issued through this store's directory
   */
  async close(): Promise<void> {
    const pending = [...NdjsonChangeLogStore.writeQueue.entries()]
      .filter(([filePath]) => path.dirname(filePath) === this.baseDir)
      .map(([, write]) => write);
    await Promise.allSettled(pending);
  }

  private async listFiles(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.baseDir);
    } catch (err) {
      // Nothing appended yet
      if (errnoCode(err) === 'ENOENT') return [];
      throw new PersistenceError({
        code: 'READ_FAILED',
        message: `Failed to list change log directory: ${this.baseDir}`,
        source: this.baseDir,
        cause: err instanceof Error ? err : undefined,
      });
    }
    return files.filter((file) => FILE_PATTERN.test(file)).sort();
  }

  private async readFiles(files: string[]): Promise<ChangeLogReadResult> {
    const sequenced: SequencedEvent[] = [];
    let skippedLines = 0;

    for (const file of files) {
      const result = await this.readNdjsonFile(path.join(this.baseDir, file));
      sequenced.push(...result.events);
      skippedLines += result.skippedLines;
    }

    sequenced.sort(
      (a, b) => a.event.createdAt.getTime() - b.event.createdAt.getTime() || a.seq - b.seq
    );
    return { events: sequenced.map(({ event }) => event), skippedLines };
  }

  private async readNdjsonFile(
    filePath: string
  ): Promise<{ events: SequencedEvent[]; skippedLines: number }> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new PersistenceError({
        code: 'READ_FAILED',
        message: `Failed to read change log file: ${filePath}`,
        source: filePath,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const events: SequencedEvent[] = [];
    let skippedLines = 0;
    const lines = content.split('\n').filter((line) => line.trim().length > 0);

    for (const line of lines) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        skippedLines++;
        continue;
      }

      const result = changeLogLineSchema.safeParse(parsed);
      if (result.success) {
        const { seq, ...event } = result.data;
        events.push({ event, seq });
      } else {
        skippedLines++;
      }
    }

    return { events, skippedLines };
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = NdjsonChangeLogStore.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<void> = next.finally(() => {
      if (NdjsonChangeLogStore.writeQueue.get(filePath) === wrapped) {
        NdjsonChangeLogStore.writeQueue.delete(filePath);
      }
    });
    NdjsonChangeLogStore.writeQueue.set(filePath, wrapped);
    return wrapped;
  }
}
