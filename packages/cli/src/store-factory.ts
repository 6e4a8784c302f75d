/**
 * Builds the configured change log store
 */

import { resolve } from 'node:path';
import { MemoryChangeLogStore, NdjsonChangeLogStore } from '@regwatch/change-core';
import type { IChangeLogStore } from '@regwatch/change-core';
import { PostgresChangeLogStore, PostgresClient } from '@regwatch/connector-db';
import type { StoreConfig } from './config.js';

export async function createChangeLogStore(config: StoreConfig): Promise<IChangeLogStore> {
  switch (config.type) {
    case 'ndjson':
      return new NdjsonChangeLogStore(resolve(process.cwd(), config.dir));

    case 'memory':
      return new MemoryChangeLogStore();

    case 'postgresql': {
      const client = new PostgresClient({
        connectionString: config.connectionString,
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl,
      });
      // Fail before any snapshot is read when the database is unreachable
      await client.connect();
      return new PostgresChangeLogStore(client, {
        table: config.table,
        schema: config.schema,
        batchSize: config.batchSize,
      });
    }

    default: {
      const exhaustive: never = config;
      throw new Error(`Unknown store type: ${JSON.stringify(exhaustive)}`);
    }
  }
}
