/**
 * Change Log Module
 *
 * Append-only stores, summarization and querying of change events.
 */

export { NdjsonChangeLogStore } from './ndjson-store.js';
export type { ChangeLogReadResult } from './ndjson-store.js';
export { MemoryChangeLogStore } from './memory-store.js';
export { summarizeChanges } from './summarize.js';
export { ChangeLogQuery } from './change-log-query.js';
