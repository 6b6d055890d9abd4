/**
 * Workday Signals - Time Utilities
 *
 * Timestamp normalization and small duration helpers. Naive timestamps
 * (no offset) are read as UTC.
 */

import type { EpochMs, TimestampInput } from '../types/common';
import { InvalidInputError } from './errors';

export const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

// YYYY-MM-DD, optionally followed by T or space, HH:MM[:SS[.fff]] and an offset
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

export function minutesToMs(minutes: number): number {
  return minutes * MS_PER_MINUTE;
}

export function msToMinutes(ms: number): number {
  return ms / MS_PER_MINUTE;
}

export function daysToMs(days: number): number {
  return days * MS_PER_DAY;
}

/**
 * Whole days elapsed from `from` to `to`, rounded down.
 */
export function wholeDaysBetween(from: EpochMs, to: EpochMs): number {
  return Math.floor((to - from) / MS_PER_DAY);
}

/**
 * Minutes east of UTC, or null for offsets past +/-14:00 or minutes over 59.
 */
function parseOffsetMinutes(offset: string): number | null {
  if (offset.toUpperCase() === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (minutes > 59 || hours * 60 + minutes > 14 * 60) return null;
  return sign * (hours * 60 + minutes);
}

function parseIsoString(value: string): EpochMs | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', offset = 'Z'] = match;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(frac.slice(0, 3).padEnd(3, '0'));

  const ms = Date.UTC(year, month, day, hour, minute, second, millis);
  const check = new Date(ms);

  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }

  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === null) return null;

  return ms - offsetMinutes * MS_PER_MINUTE;
}

/**
 * Normalize a timestamp to epoch ms.
 *
 * @throws InvalidInputError naming `itemId` when the value is missing or malformed
 */
export function parseTimestamp(
  value: TimestampInput | null | undefined,
  itemId: string,
  field: string
): EpochMs {
  if (value === undefined || value === null || value === '') {
    throw new InvalidInputError(itemId, `missing ${field}`, field);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(itemId, `${field} is not a finite number`, field);
    }
    return value;
  }

  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new InvalidInputError(itemId, `${field} is an invalid Date`, field);
    }
    return ms;
  }

  const parsed = parseIsoString(value);
  if (parsed === null) {
    throw new InvalidInputError(itemId, `cannot parse ${field} '${value}'`, field);
  }
  return parsed;
}

/**
 * Parse `HH:MM` into minutes after midnight.
 */
export function parseClockMinutes(value: string): number | null {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 24 || minutes > 59 || (hours === 24 && minutes !== 0)) return null;
  return hours * 60 + minutes;
}

/**
 * Render minutes as `2h 10m`, `1h` or `45m`.
 */
export function formatMinutes(totalMinutes: number): string {
  const rounded = Math.round(totalMinutes);
  const hours = Math.floor(rounded / 60);
  const minutes = rounded % 60;
  if (hours === 0) return `${minutes}m`;
  if (minutes === 0) return `${hours}h`;
  return `${hours}h ${minutes}m`;
}
