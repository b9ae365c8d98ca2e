/**
 * Date helpers for billing windows and report names.
 *
 * All instants are compared on one naive UTC timeline. Timestamps that arrive
 * as strings with a UTC offset keep their wall-clock reading and lose the
 * offset, so "10:00+05:00" and "10:00Z" compare equal.
 */

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Places a timestamp on the naive UTC timeline.
 *
 * @param value - Date (returned unchanged) or ISO-8601 string
 * @returns Date whose UTC fields equal the timestamp's wall-clock fields
 * @throws {RangeError} If the string cannot be parsed
 */
export function toNaiveUtc(value: Date | string): Date {
  if (value instanceof Date) {
    return value;
  }

  const wallClock = value.includes('T') ? value.trim().replace(OFFSET_SUFFIX, '') : value.trim();
  const parsed = new Date(wallClock.includes('T') ? `${wallClock}Z` : `${wallClock}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime())) {
    throw new RangeError(`Invalid timestamp: ${value}`);
  }
  return parsed;
}

/**
 * Hours elapsed from `from` to `to` (negative when `to` is earlier).
 */
export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / HOUR_MS;
}

/**
 * Window ending at `now` and reaching back `daysBack` whole days.
 */
export function billingWindowEndingAt(now: Date, daysBack: number): { start: Date; end: Date } {
  return {
    start: new Date(now.getTime() - daysBack * DAY_MS),
    end: now,
  };
}

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * YYYY-MM-DD in UTC, the date format Cost Explorer expects.
 */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYYMMDD from the local calendar date.
 */
export function formatCompactDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * YYYYMMDD_HHMMSS from the local wall clock, used in report file names.
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${formatCompactDate(date)}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
