/**
 * @graphdex/support — UTC time helpers
 *
 * All calendar arithmetic is done in UTC; local time zones never leak into
 * rollover index names or time set boundaries.
 */

import { InvalidValueError } from './errors.js';

export type TimeUnit = 'hour' | 'day' | 'month' | 'year';

const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

export function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

/**
 * Advance a timestamp by exactly one calendar unit.
 *
 * Month and year steps clamp the day of month, so Jan 31 + 1 month is
 * Feb 28 (or 29) rather than rolling into March.
 */
export function advanceOneUnit(time: Date, unit: TimeUnit): Date {
  switch (unit) {
    case 'hour':
      return new Date(time.getTime() + MS_PER_HOUR);
    case 'day':
      return new Date(time.getTime() + MS_PER_DAY);
    case 'month':
      return shiftMonths(time, 1);
    case 'year':
      return shiftMonths(time, 12);
  }
}

function shiftMonths(time: Date, months: number): Date {
  const totalMonths = time.getUTCFullYear() * 12 + time.getUTCMonth() + months;
  const year = Math.floor(totalMonths / 12);
  const monthIndex = totalMonths - year * 12;
  const day = Math.min(time.getUTCDate(), daysInMonth(year, monthIndex));

  return new Date(
    Date.UTC(
      year,
      monthIndex,
      day,
      time.getUTCHours(),
      time.getUTCMinutes(),
      time.getUTCSeconds(),
      time.getUTCMilliseconds(),
    ),
  );
}

/**
 * Build a UTC date from calendar components, returning null when any
 * component is out of range (e.g. month 13 or Feb 30).
 */
export function utcDate(
  year: number,
  month = 1,
  day = 1,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0,
): Date | null {
  if (!Number.isInteger(year) || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month - 1)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) return null;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);
  return date;
}

/**
 * Parse an ISO 8601 timestamp.
 *
 * Accepts a bare date (interpreted as midnight UTC) or a date-time with an
 * optional fraction and an optional `Z` / `±HH:MM` offset (UTC when omitted).
 *
 * @throws InvalidValueError when the value is not a valid ISO 8601 timestamp
 */
export function parseIso8601(value: string): Date {
  const dateOnly = DATE_ONLY.exec(value);
  if (dateOnly) {
    const date = utcDate(Number(dateOnly[1]), Number(dateOnly[2]), Number(dateOnly[3]));
    if (date) return date;
  }

  const dateTime = DATE_TIME.exec(value);
  if (dateTime) {
    const [, year, month, day, hour, minute, second, fraction, offset] = dateTime;
    const millisecond = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;
    const date = utcDate(
      Number(year),
      Number(month),
      Number(day),
      Number(hour),
      Number(minute),
      Number(second ?? '0'),
      millisecond,
    );

    if (date) return new Date(date.getTime() - offsetMillis(offset));
  }

  throw new InvalidValueError(`\`${value}\` is not a valid ISO 8601 timestamp.`);
}

function offsetMillis(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === 'Z') return 0;

  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * MS_PER_HOUR + minutes * 60 * 1000);
}

/**
 * Coerce a record value into a Date. Strings are parsed as ISO 8601.
 */
export function toDate(value: unknown): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidValueError('Invalid Date provided as a timestamp.');
    }
    return value;
  }
  if (typeof value === 'string') return parseIso8601(value);

  throw new InvalidValueError(`Expected an ISO 8601 timestamp string but got \`${String(value)}\`.`);
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Format a date in UTC using `%Y`, `%m`, `%d`, `%H`, `%M` and `%S` directives.
 *
 * @example
 * ```ts
 * formatUtc(new Date('2020-04-23T18:25:43Z'), '%Y-%m'); // "2020-04"
 * ```
 */
export function formatUtc(time: Date, pattern: string): string {
  return pattern.replace(/%([YmdHMS])/g, (_match, directive: string) => {
    switch (directive) {
      case 'Y':
        return pad(time.getUTCFullYear(), 4);
      case 'm':
        return pad(time.getUTCMonth() + 1);
      case 'd':
        return pad(time.getUTCDate());
      case 'H':
        return pad(time.getUTCHours());
      case 'M':
        return pad(time.getUTCMinutes());
      default:
        return pad(time.getUTCSeconds());
    }
  });
}
