/**
 * Date/time utilities shared by the weather packages
 * Uses native Date APIs only - all calendar math is done in UTC
 */

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

// =============================================================================
// Helper to normalize date input
// =============================================================================

function toDate(date: Date | string | number): Date {
  if (date instanceof Date) return date;
  return new Date(date);
}

// =============================================================================
// Unix timestamps
// =============================================================================

/**
 * Convert a Unix timestamp in seconds (as sent by upstream APIs) to a Date
 *
 * @example
 * fromUnixSeconds(1700000000).toISOString() // "2023-11-14T22:13:20.000Z"
 */
export function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

// =============================================================================
// UTC calendar days
// =============================================================================

/**
 * Format a date as its UTC calendar day
 *
 * @example
 * toUtcDateKey(new Date('2024-03-05T23:59:00-02:00')) // "2024-03-06"
 */
export function toUtcDateKey(date: Date | string | number): string {
  return toDate(date).toISOString().slice(0, 10);
}

/**
 * Parse a `YYYY-MM-DD` key as midnight UTC of that day
 */
export function parseUtcDateKey(key: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(key);
  if (!match) {
    throw new RangeError(`Invalid UTC date key: ${key}`);
  }
  const [, year, month, day] = match;
  return new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
}

/**
 * Whole days from one UTC calendar day to another (negative if `to` is earlier)
 *
 * @example
 * daysBetweenUtcDates('2024-02-27', '2024-03-01') // 3
 */
export function daysBetweenUtcDates(from: string, to: string): number {
  return Math.round((parseUtcDateKey(to).getTime() - parseUtcDateKey(from).getTime()) / DAY_MS);
}

/**
 * The date `days` days before `date`, at the same time of day
 */
export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

// =============================================================================
// Relative time formatting
// =============================================================================

/**
 * Format a date as relative time (e.g., "2h ago", "in 3d")
 *
 * @example
 * formatRelativeTime(Date.now() - 3600000) // "1h ago"
 * formatRelativeTime(Date.now() + 86400000) // "in 1d"
 */
export function formatRelativeTime(date: Date | string | number, now: number = Date.now()): string {
  const diff = toDate(date).getTime() - now;
  const absDiff = Math.abs(diff);
  const isPast = diff < 0;

  if (absDiff < MINUTE_MS) {
    return 'just now';
  }

  if (absDiff < HOUR_MS) {
    const minutes = Math.floor(absDiff / MINUTE_MS);
    return isPast ? `${minutes}m ago` : `in ${minutes}m`;
  }

  if (absDiff < DAY_MS) {
    const hours = Math.floor(absDiff / HOUR_MS);
    return isPast ? `${hours}h ago` : `in ${hours}h`;
  }

  const days = Math.floor(absDiff / DAY_MS);
  return isPast ? `${days}d ago` : `in ${days}d`;
}
