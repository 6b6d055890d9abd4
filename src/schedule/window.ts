import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig } from '../config';
import { InvalidInputError } from '../utils/errors';
import { minutesToMs, parseTimestamp } from '../utils/time';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type WorkdayOptions = Partial<
  Pick<AnalyzerConfig, 'workdayStartMinutes' | 'workdayEndMinutes' | 'utcOffsetMinutes'>
>;

/**
 * Working hours of a calendar date as an absolute [dayStart, dayEnd) window.
 *
 * @param date - `YYYY-MM-DD` in the user's local calendar
 * @param itemId - names the day in errors; defaults to the date itself
 */
export function buildDayWindow(
  date: string,
  options: WorkdayOptions = {},
  itemId: string = date
): { dayStart: number; dayEnd: number } {
  const {
    workdayStartMinutes = DEFAULT_ANALYZER_CONFIG.workdayStartMinutes,
    workdayEndMinutes = DEFAULT_ANALYZER_CONFIG.workdayEndMinutes,
    utcOffsetMinutes = DEFAULT_ANALYZER_CONFIG.utcOffsetMinutes,
  } = options;

  if (!DATE_PATTERN.test(date)) {
    throw new InvalidInputError(itemId, 'date must be YYYY-MM-DD', 'date');
  }
  if (workdayEndMinutes <= workdayStartMinutes) {
    throw new InvalidInputError(itemId, 'workday end must be after workday start', 'workdayEndMinutes');
  }

  const localMidnightAsUtc = parseTimestamp(date, itemId, 'date');
  const base = localMidnightAsUtc - minutesToMs(utcOffsetMinutes);

  return {
    dayStart: base + minutesToMs(workdayStartMinutes),
    dayEnd: base + minutesToMs(workdayEndMinutes),
  };
}
