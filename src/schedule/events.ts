import type { RejectedInput } from '../types/common';
import type { CalendarEvent, CalendarEventInput } from '../types/calendar';
import { InvalidInputError, isInvalidInputError } from '../utils/errors';
import { parseTimestamp } from '../utils/time';

export function eventIdFor(input: CalendarEventInput, index: number): string {
  return input.id && input.id.length > 0 ? input.id : `event[${index}]`;
}

/**
 * Normalize one event from the calendar collaborator.
 *
 * @throws InvalidInputError on a malformed timestamp or an end before its start
 */
export function normalizeEvent(input: CalendarEventInput, index: number): CalendarEvent {
  const id = eventIdFor(input, index);
  const startAt = parseTimestamp(input.start, id, 'start');
  const endAt = parseTimestamp(input.end, id, 'end');

  if (endAt < startAt) {
    throw new InvalidInputError(id, 'end is before start', 'end');
  }

  return {
    id,
    title: input.title,
    startAt,
    endAt,
    attendees: new Set(input.attendees ?? []),
    kind: input.kind ?? 'meeting',
  };
}

export interface NormalizedEvents {
  events: CalendarEvent[];
  rejected: RejectedInput[];
}

/**
 * Normalize a batch. Invalid events are collected in `rejected` unless
 * `failFast` is set, in which case the first one is rethrown.
 */
export function normalizeEvents(
  inputs: readonly CalendarEventInput[],
  failFast: boolean = false
): NormalizedEvents {
  const events: CalendarEvent[] = [];
  const rejected: RejectedInput[] = [];

  inputs.forEach((input, index) => {
    try {
      events.push(normalizeEvent(input, index));
    } catch (error) {
      if (failFast || !isInvalidInputError(error)) throw error;
      rejected.push(error.toRejected());
    }
  });

  return { events, rejected };
}
