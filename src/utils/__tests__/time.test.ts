/**
 * Workday Signals - Time Utility Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '../errors';
import {
  formatMinutes,
  parseClockMinutes,
  parseTimestamp,
  wholeDaysBetween,
  MS_PER_DAY,
} from '../time';

describe('parseTimestamp', () => {
  it('should parse UTC ISO timestamps', () => {
    expect(parseTimestamp('2024-01-15T14:00:00Z', 'x', 'start')).toBe(Date.UTC(2024, 0, 15, 14));
  });

  it('should read naive timestamps as UTC', () => {
    expect(parseTimestamp('2024-01-15T14:00:00', 'x', 'start')).toBe(Date.UTC(2024, 0, 15, 14));
    expect(parseTimestamp('2024-01-15 14:00:00', 'x', 'start')).toBe(Date.UTC(2024, 0, 15, 14));
    expect(parseTimestamp('2024-01-15T14:00', 'x', 'start')).toBe(Date.UTC(2024, 0, 15, 14));
  });

  it('should parse bare dates as UTC midnight', () => {
    expect(parseTimestamp('2024-01-15', 'x', 'addedAt')).toBe(Date.UTC(2024, 0, 15));
  });

  it('should apply explicit offsets', () => {
    expect(parseTimestamp('2024-01-15T14:00:00+02:00', 'x', 'start')).toBe(Date.UTC(2024, 0, 15, 12));
    expect(parseTimestamp('2024-01-15T14:00:00.250-05:30', 'x', 'start')).toBe(
      Date.UTC(2024, 0, 15, 19, 30, 0, 250)
    );
  });

  it('should pass through epoch milliseconds and Dates', () => {
    const ms = Date.UTC(2024, 5, 1, 8, 30);
    expect(parseTimestamp(ms, 'x', 'start')).toBe(ms);
    expect(parseTimestamp(new Date(ms), 'x', 'start')).toBe(ms);
  });

  it('should reject impossible calendar dates', () => {
    expect(() => parseTimestamp('2024-02-30', 'x', 'start')).toThrow("x: cannot parse start '2024-02-30'");
  });

  it('should reject impossible offsets', () => {
    expect(() => parseTimestamp('2024-01-15T14:00:00+99:99', 'x', 'start')).toThrow(
      "x: cannot parse start '2024-01-15T14:00:00+99:99'"
    );
    expect(() => parseTimestamp('2024-01-15T14:00:00+05:60', 'x', 'start')).toThrow(InvalidInputError);
    expect(parseTimestamp('2024-01-15T14:00:00+14:00', 'x', 'start')).toBe(Date.UTC(2024, 0, 15));
  });

  it('should reject free text', () => {
    expect(() => parseTimestamp('next tuesday', 'evt-1', 'end')).toThrow(InvalidInputError);
  });

  it('should name the item and field of a missing value', () => {
    try {
      parseTimestamp(undefined, 'item-7', 'lastTouchedAt');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.itemId).toBe('item-7');
        expect(error.field).toBe('lastTouchedAt');
        expect(error.message).toBe('item-7: missing lastTouchedAt');
      }
    }
  });

  it('should reject non-finite numbers and invalid Dates', () => {
    expect(() => parseTimestamp(Number.NaN, 'x', 'start')).toThrow('x: start is not a finite number');
    expect(() => parseTimestamp(new Date('nope'), 'x', 'start')).toThrow('x: start is an invalid Date');
  });
});

describe('parseClockMinutes', () => {
  it('should parse HH:MM', () => {
    expect(parseClockMinutes('09:30')).toBe(570);
    expect(parseClockMinutes('7:05')).toBe(425);
    expect(parseClockMinutes('24:00')).toBe(1440);
  });

  it('should return null for invalid clock values', () => {
    expect(parseClockMinutes('25:00')).toBeNull();
    expect(parseClockMinutes('24:30')).toBeNull();
    expect(parseClockMinutes('09:60')).toBeNull();
    expect(parseClockMinutes('9am')).toBeNull();
  });
});

describe('wholeDaysBetween', () => {
  it('should round partial days down', () => {
    const from = Date.UTC(2024, 0, 1);
    expect(wholeDaysBetween(from, from + 9 * MS_PER_DAY)).toBe(9);
    expect(wholeDaysBetween(from, from + 9 * MS_PER_DAY - 1)).toBe(8);
  });
});

describe('formatMinutes', () => {
  it('should render hours and minutes', () => {
    expect(formatMinutes(70)).toBe('1h 10m');
    expect(formatMinutes(480)).toBe('8h');
    expect(formatMinutes(45)).toBe('45m');
    expect(formatMinutes(0)).toBe('0m');
  });
});
