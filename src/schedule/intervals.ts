import type { TimeSpan } from '../types/common';

/**
 * Clip a span to [window.startAt, window.endAt). Returns null when nothing
 * of the span is left inside the window.
 */
export function clipToWindow<T extends TimeSpan>(span: T, window: TimeSpan): T | null {
  const startAt = Math.max(span.startAt, window.startAt);
  const endAt = Math.min(span.endAt, window.endAt);
  if (endAt <= startAt) return null;
  if (startAt === span.startAt && endAt === span.endAt) return span;
  return { ...span, startAt, endAt };
}

/**
 * Order by start; identical starts put the shorter span first.
 */
export function sortSpans<T extends TimeSpan>(spans: readonly T[]): T[] {
  return [...spans].sort((a, b) => {
    if (a.startAt !== b.startAt) return a.startAt - b.startAt;
    return (a.endAt - a.startAt) - (b.endAt - b.startAt);
  });
}

/**
 * Coalesce overlapping and touching spans into a sorted, disjoint set.
 */
export function mergeSpans(spans: readonly TimeSpan[]): TimeSpan[] {
  const merged: TimeSpan[] = [];

  for (const span of sortSpans(spans)) {
    const last = merged[merged.length - 1];
    if (last && span.startAt <= last.endAt) {
      last.endAt = Math.max(last.endAt, span.endAt);
    } else {
      merged.push({ startAt: span.startAt, endAt: span.endAt });
    }
  }

  return merged;
}

/**
 * Parts of `window` not covered by `busy`. `busy` must be sorted and disjoint,
 * as returned by mergeSpans.
 */
export function complementWithin(window: TimeSpan, busy: readonly TimeSpan[]): TimeSpan[] {
  const free: TimeSpan[] = [];
  let cursor = window.startAt;

  for (const b of busy) {
    if (b.endAt <= window.startAt || b.startAt >= window.endAt) continue;
    if (b.startAt > cursor) free.push({ startAt: cursor, endAt: b.startAt });
    cursor = Math.max(cursor, b.endAt);
  }

  if (cursor < window.endAt) free.push({ startAt: cursor, endAt: window.endAt });
  return free;
}

export function sumDurationMs(spans: readonly TimeSpan[]): number {
  return spans.reduce((total, s) => total + (s.endAt - s.startAt), 0);
}
