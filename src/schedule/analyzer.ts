/**
 * Workday Signals - Schedule Analyzer
 *
 * Meeting load, free time and back-to-back detection for a single day
 * window. Pure: no I/O, no logging, no shared state, so days can be
 * analyzed independently and in any order.
 */

import { DEFAULT_ANALYZER_CONFIG, mergeAnalyzerConfig, type AnalyzerConfig } from '../config';
import type { BatchOptions, TimeSpan } from '../types/common';
import type {
  BackToBackWarning,
  CalendarEvent,
  DayAnalysis,
  DayInput,
  DayResult,
  FreeInterval,
  MeetingConflict,
  MeetingRef,
} from '../types/calendar';
import { InvalidInputError, isInvalidInputError } from '../utils/errors';
import { minutesToMs, msToMinutes, parseTimestamp } from '../utils/time';
import { normalizeEvents } from './events';
import { buildDayWindow } from './window';
import { clipToWindow, complementWithin, mergeSpans, sortSpans, sumDurationMs } from './intervals';

export interface AnalyzeOptions extends BatchOptions {
  config?: Partial<AnalyzerConfig>;
}

function resolveConfig(overrides?: Partial<AnalyzerConfig>): AnalyzerConfig {
  return mergeAnalyzerConfig(DEFAULT_ANALYZER_CONFIG, overrides);
}

function toRef(event: CalendarEvent): MeetingRef {
  return { id: event.id, title: event.title, startAt: event.startAt, endAt: event.endAt };
}

function toFreeInterval(span: TimeSpan): FreeInterval {
  return { startAt: span.startAt, endAt: span.endAt, durationMinutes: msToMinutes(span.endAt - span.startAt) };
}

/**
 * Events of `kind`, clipped to the window, in start order.
 */
function clippedOfKind(events: readonly CalendarEvent[], kind: CalendarEvent['kind'], window: TimeSpan): CalendarEvent[] {
  const clipped: CalendarEvent[] = [];
  for (const event of events) {
    if (event.kind !== kind) continue;
    const inside = clipToWindow(event, window);
    if (inside) clipped.push(inside);
  }
  return sortSpans(clipped);
}

function resolveWindow(input: DayInput, config: AnalyzerConfig): TimeSpan {
  const id = input.id ?? 'day';

  if (input.dayStart == null && input.dayEnd == null && input.date !== undefined) {
    const { dayStart, dayEnd } = buildDayWindow(input.date, config, id);
    return { startAt: dayStart, endAt: dayEnd };
  }

  const startAt = parseTimestamp(input.dayStart, id, 'dayStart');
  const endAt = parseTimestamp(input.dayEnd, id, 'dayEnd');
  if (endAt <= startAt) {
    throw new InvalidInputError(id, 'dayEnd must be after dayStart', 'dayEnd');
  }
  return { startAt, endAt };
}

function pairWarnings(
  meetings: readonly CalendarEvent[],
  backToBackGapMs: number
): { backToBack: BackToBackWarning[]; conflicts: MeetingConflict[] } {
  const backToBack: BackToBackWarning[] = [];
  const conflicts: MeetingConflict[] = [];

  if (meetings.length === 0) return { backToBack, conflicts };

  // Gaps run from the latest end seen so far; a meeting nested in a longer
  // one leaves it unchanged
  let latest = meetings[0];
  for (let i = 1; i < meetings.length; i++) {
    const next = meetings[i];
    const gapMs = next.startAt - latest.endAt;

    if (gapMs < 0) {
      const overlapMs = Math.min(latest.endAt, next.endAt) - next.startAt;
      conflicts.push({ first: toRef(latest), second: toRef(next), overlapMinutes: msToMinutes(overlapMs) });
    } else if (gapMs < backToBackGapMs) {
      backToBack.push({ first: toRef(latest), second: toRef(next), gapMinutes: msToMinutes(gapMs) });
    }

    if (next.endAt > latest.endAt) latest = next;
  }

  return { backToBack, conflicts };
}

/**
 * Analyze one day.
 *
 * @throws InvalidInputError when the day window is missing or malformed, or on the first
 * malformed event when `failFast` is set
 */
export function analyzeDay(input: DayInput, options: AnalyzeOptions = {}): DayAnalysis {
  const config = resolveConfig(options.config);
  const window = resolveWindow(input, config);
  const { events, rejected } = normalizeEvents(input.events, options.failFast);

  const meetings = clippedOfKind(events, 'meeting', window);
  const busy = mergeSpans(meetings);
  const totalMeetingMinutes = msToMinutes(sumDurationMs(busy));

  // A meeting-free day reports its whole window, however short
  const minGapMs = minutesToMs(config.minFreeGapMinutes);
  const freeIntervals = meetings.length === 0
    ? [toFreeInterval(window)]
    : complementWithin(window, busy)
        .filter((span) => span.endAt - span.startAt >= minGapMs)
        .map(toFreeInterval);

  const totalFreeMinutes = freeIntervals.reduce((sum, f) => sum + f.durationMinutes, 0);
  const longestFreeMinutes = freeIntervals.reduce((max, f) => Math.max(max, f.durationMinutes), 0);

  const focusBlocks = mergeSpans(clippedOfKind(events, 'focusTime', window));
  const { backToBack, conflicts } = pairWarnings(meetings, minutesToMs(config.backToBackGapMinutes));

  return {
    dayStart: window.startAt,
    dayEnd: window.endAt,
    meetingCount: meetings.length,
    totalMeetingMinutes,
    scheduledFocusMinutes: msToMinutes(sumDurationMs(focusBlocks)),
    freeIntervals,
    totalFreeMinutes,
    longestFreeMinutes,
    meetingHeavy: totalMeetingMinutes > config.meetingHeavyMinutes,
    fragmented: meetings.length > 0 && longestFreeMinutes < config.focusBlockMinutes,
    backToBack,
    conflicts,
    rejected,
  };
}

/**
 * Analyze several days independently. A malformed day is reported in its
 * own result unless `failFast` is set.
 */
export function analyzeDays(days: readonly DayInput[], options: AnalyzeOptions = {}): DayResult[] {
  return days.map((day, index): DayResult => {
    const input: DayInput = { ...day, id: day.id ?? `day[${index}]` };
    try {
      return { ok: true, analysis: analyzeDay(input, options) };
    } catch (error) {
      if (options.failFast || !isInvalidInputError(error)) throw error;
      return { ok: false, error: error.toRejected() };
    }
  });
}
