export type { ISnapshotLoader, SnapshotLoadOptions } from './snapshot-loader.js';
export type { ILogger } from './logger.js';
