import { describe, expect, it } from 'vitest';
import { MemoryChangeLogStore, NdjsonChangeLogStore } from '@regwatch/change-core';
import { createChangeLogStore } from '../src/store-factory.js';

describe('createChangeLogStore', () => {
  it('builds file and in-memory stores from config', async () => {
    await expect(createChangeLogStore({ type: 'memory' })).resolves.toBeInstanceOf(MemoryChangeLogStore);
    await expect(createChangeLogStore({ type: 'ndjson', dir: './.change-log' })).resolves.toBeInstanceOf(
      NdjsonChangeLogStore
    );
  });
});
