/**
 * Canonical stringification of field values.
 *
 * Field-update detection compares these strings, so `500000`, `500000.0` and
 * `"500000"` must all render the same and absent values must render as "".
 */

import { formatTimestamp } from './dates.js';

export function stringifyFieldValue(value: unknown): string {
  if (value === null || value === undefined) return '';

  if (typeof value === 'string') return value.trim();

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return '';
    // -0 prints as "0"
    return String(value);
  }

  if (typeof value === 'bigint') return value.toString();

  if (typeof value === 'boolean') return value ? 'true' : 'false';

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : formatTimestamp(value);
  }

  return JSON.stringify(value);
}
