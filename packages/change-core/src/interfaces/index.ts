/**
 * Interface exports for change-core
 */

export type { IChangeDetector } from './change-detector.js';

export type {
  IChangeLogStore,
  AppendResult,
} from './change-log-store.js';

export type { ILogger } from '@regwatch/core';
