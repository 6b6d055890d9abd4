/**
 * Workday Signals - Calendar Types
 *
 * Calendar events arrive from an external calendar collaborator; this
 * module only describes the snapshot shape and the derived analysis.
 */

import type { EpochMs, RejectedInput, TimeSpan, TimestampInput } from './common';

// =============================================================================
// EVENTS
// =============================================================================

export type CalendarEventKind = 'meeting' | 'focusTime' | 'workingLocation' | 'other';

export const CALENDAR_EVENT_KINDS: readonly CalendarEventKind[] = [
  'meeting',
  'focusTime',
  'workingLocation',
  'other',
];

/**
 * Event as received from the calendar collaborator.
 * `kind` defaults to 'meeting'.
 */
export interface CalendarEventInput {
  id?: string;
  title: string;
  start?: TimestampInput | null;
  end?: TimestampInput | null;
  attendees?: string[];
  kind?: CalendarEventKind;
}

/**
 * Normalized, immutable event snapshot.
 */
export interface CalendarEvent extends TimeSpan {
  readonly id: string;
  readonly title: string;
  readonly attendees: ReadonlySet<string>;
  readonly kind: CalendarEventKind;
}

// =============================================================================
// ANALYSIS
// =============================================================================

export interface FreeInterval extends TimeSpan {
  durationMinutes: number;
}

export interface MeetingRef extends TimeSpan {
  id: string;
  title: string;
}

/** Two consecutive meetings with less than the back-to-back gap between them */
export interface BackToBackWarning {
  first: MeetingRef;
  second: MeetingRef;
  gapMinutes: number;
}

/** Two consecutive meetings whose spans overlap */
export interface MeetingConflict {
  first: MeetingRef;
  second: MeetingRef;
  overlapMinutes: number;
}

export interface DayAnalysis {
  dayStart: EpochMs;
  dayEnd: EpochMs;
  meetingCount: number;
  totalMeetingMinutes: number;
  scheduledFocusMinutes: number;
  freeIntervals: FreeInterval[];
  totalFreeMinutes: number;
  longestFreeMinutes: number;
  meetingHeavy: boolean;
  fragmented: boolean;
  backToBack: BackToBackWarning[];
  conflicts: MeetingConflict[];
  rejected: RejectedInput[];
}

/**
 * One day to analyze: either an explicit [dayStart, dayEnd) window or a
 * local `YYYY-MM-DD` date expanded to the configured working hours.
 */
export interface DayInput {
  /** Names the day in errors; defaults to 'day' */
  id?: string;
  dayStart?: TimestampInput | null;
  dayEnd?: TimestampInput | null;
  date?: string;
  events: CalendarEventInput[];
}

export type DayResult =
  | { ok: true; analysis: DayAnalysis }
  | { ok: false; error: RejectedInput };
