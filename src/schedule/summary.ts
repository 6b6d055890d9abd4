import type { DayAnalysis } from '../types/calendar';
import { formatMinutes } from '../utils/time';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One-line plain-text summary of a day, for the assistant's briefing.
 */
export function describeDay(analysis: DayAnalysis): string {
  if (analysis.meetingCount === 0) {
    return `No meetings. ${formatMinutes(analysis.totalFreeMinutes)} free.`;
  }

  const parts: string[] = [
    `${plural(analysis.meetingCount, 'meeting')} (${formatMinutes(analysis.totalMeetingMinutes)})`,
  ];

  if (analysis.freeIntervals.length === 0) {
    parts.push('no free blocks');
  } else {
    parts.push(
      `${plural(analysis.freeIntervals.length, 'free block')}, longest ${formatMinutes(analysis.longestFreeMinutes)}`
    );
  }

  const flags: string[] = [];
  if (analysis.meetingHeavy) flags.push('Meeting-heavy.');
  if (analysis.fragmented) flags.push('Fragmented.');
  if (analysis.backToBack.length > 0) flags.push(`${plural(analysis.backToBack.length, 'back-to-back pair')}.`);
  if (analysis.conflicts.length > 0) flags.push(`${plural(analysis.conflicts.length, 'conflict')}.`);

  return [`${parts.join(', ')}.`, ...flags].join(' ');
}
