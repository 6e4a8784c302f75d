/**
 * Date helpers for snapshot observation dates and change dates.
 * All calendar dates are handled in UTC.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_FIRST_DATE = /^(\d{1,2})[-/](\d{1,2})[-/](\d{4})$/;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  // Reject rollovers such as 2024-02-31
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Parse a snapshot date value.
 *
 * Accepts Date instances, `YYYY-MM-DD`, `DD-MM-YYYY` / `DD/MM/YYYY` and ISO
 * datetimes (zone-less datetimes are read as UTC). Returns null for empty or
 * unparseable input.
 */
export function parseSnapshotDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (trimmed === '') return null;

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dayFirst = DAY_FIRST_DATE.exec(trimmed);
  if (dayFirst) {
    return utcDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }

  if (ISO_DATETIME.test(trimmed)) {
    const normalized = trimmed.replace(' ', 'T');
    const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(normalized);
    const date = new Date(hasZone ? normalized : `${normalized}Z`);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  return null;
}

/**
 * Format a date as `YYYY-MM-DD` (UTC)
 */
export function formatDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Format a timestamp: the date key at UTC midnight, the full ISO string otherwise
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}
