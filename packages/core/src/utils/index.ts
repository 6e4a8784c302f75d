export { stringifyFieldValue } from './stringify.js';
export { parseSnapshotDate, formatDateKey, formatTimestamp } from './dates.js';
