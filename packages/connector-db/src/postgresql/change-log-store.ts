/**
 * PostgreSQL Change Log Store
 *
 * Persists change events to the company_changes table. The table is created
 * on first use; rows are inserted with batched multi-row INSERTs.
 */

import { PersistenceError, storedChangeEventSchema } from '@regwatch/core';
import type { ChangeEvent, StoredChangeEvent } from '@regwatch/core';
import type { AppendResult, IChangeLogStore } from '@regwatch/change-core';
import { validateIdentifier, type PostgresClient } from './client.js';

export interface PostgresChangeLogStoreOptions {
  /** Table name (default: company_changes) */
  table?: string;
  /** Schema (default: public) */
  schema?: string;
  /** Rows per INSERT statement (default: 500) */
  batchSize?: number;
}

/** Insert columns, in parameter order */
export const CHANGE_COLUMNS = [
  'identifier',
  'change_type',
  'field_changed',
  'old_value',
  'new_value',
  'date',
  'company_name',
  'state',
  'status',
] as const;

interface ChangeRow {
  id: string | number;
  identifier: string;
  change_type: string;
  field_changed: string;
  old_value: string | null;
  new_value: string | null;
  date: Date | string;
  company_name: string | null;
  state: string | null;
  status: string | null;
  created_at: Date | string;
}

function toParams(event: ChangeEvent): unknown[] {
  return [
    event.identifier,
    event.changeType,
    event.fieldChanged,
    event.oldValue,
    event.newValue,
    event.date,
    event.companyName,
    event.state,
    event.status,
  ];
}

export class PostgresChangeLogStore implements IChangeLogStore {
  private readonly qualifiedTable: string;
  private readonly batchSize: number;
  private tableReady = false;

  constructor(
    private readonly client: PostgresClient,
    options: PostgresChangeLogStoreOptions = {}
  ) {
    const table = options.table ?? 'company_changes';
    const schema = options.schema ?? 'public';

    // Validate identifiers to prevent SQL injection
    validateIdentifier(schema, 'schema');
    validateIdentifier(table, 'table');

    this.qualifiedTable = `"${schema}"."${table}"`;
    this.batchSize = Math.max(1, options.batchSize ?? 500);
  }

  /**
   * Create the change table if it does not exist
   */
  async ensureTable(): Promise<void> {
    if (this.tableReady) return;

    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${this.qualifiedTable} (
        id BIGSERIAL PRIMARY KEY,
        identifier TEXT NOT NULL,
        change_type TEXT NOT NULL,
        field_changed TEXT NOT NULL,
        old_value TEXT,
        new_value TEXT,
        date TIMESTAMPTZ NOT NULL,
        company_name TEXT,
        state TEXT,
        status TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )`,
      [],
      'WRITE_FAILED'
    );
    this.tableReady = true;
  }

  async append(events: readonly ChangeEvent[]): Promise<AppendResult> {
    if (events.length === 0) return { appended: 0 };

    await this.ensureTable();

    for (let start = 0; start < events.length; start += this.batchSize) {
      const batch = events.slice(start, start + this.batchSize);
      const width = CHANGE_COLUMNS.length;
      const values = batch
        .map((_, row) => `(${CHANGE_COLUMNS.map((_, col) => `$${row * width + col + 1}`).join(', ')})`)
        .join(', ');

      await this.client.query(
        `INSERT INTO ${this.qualifiedTable} (${CHANGE_COLUMNS.join(', ')}) VALUES ${values}`,
        batch.flatMap(toParams),
        'WRITE_FAILED'
      );
    }

    return { appended: events.length };
  }

  /**
   * Read all events in insertion order
   */
  async readAll(): Promise<StoredChangeEvent[]> {
    await this.ensureTable();

    const result = await this.client.query<ChangeRow>(
      `SELECT id, ${CHANGE_COLUMNS.join(', ')}, created_at FROM ${this.qualifiedTable} ORDER BY id ASC`
    );

    return result.rows.map((row) => this.fromRow(row));
  }

  async close(): Promise<void> {
    await this.client.disconnect();
  }

  private fromRow(row: ChangeRow): StoredChangeEvent {
    const parsed = storedChangeEventSchema.safeParse({
      id: String(row.id),
      identifier: row.identifier,
      changeType: row.change_type,
      fieldChanged: row.field_changed,
      oldValue: row.old_value ?? '',
      newValue: row.new_value ?? '',
      date: row.date,
      companyName: row.company_name ?? '',
      state: row.state ?? '',
      status: row.status ?? '',
      createdAt: row.created_at,
    });

    if (!parsed.success) {
      throw new PersistenceError({
        code: 'READ_FAILED',
        message: `Invalid change row ${String(row.id)}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        source: this.qualifiedTable,
      });
    }

    return parsed.data;
  }
}
