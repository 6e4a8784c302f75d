/**
 * @regwatch/connector-db
 *
 * Database-backed change log stores
 */

export * from './postgresql/index.js';
