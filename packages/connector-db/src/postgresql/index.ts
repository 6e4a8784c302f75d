/**
 * PostgreSQL change log persistence
 */

export { PostgresClient, validateIdentifier } from './client.js';
export type { PostgresClientConfig, PostgresQueryResult } from './client.js';

export { PostgresChangeLogStore, CHANGE_COLUMNS } from './change-log-store.js';
export type { PostgresChangeLogStoreOptions } from './change-log-store.js';
