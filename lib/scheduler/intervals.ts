/**
 * lib/scheduler/intervals.ts
 *
 * Same-day interval arithmetic on minutes from midnight.
 *
 * Rules:
 * - Intervals are half-open: [startMinutes, endMinutes)
 * - Touching intervals (a.end === b.start) merge into one run
 * - Nothing here crosses midnight
 */

import type { TimeInterval } from './types';

export const DAY_START_MINUTES = 0;
export const DAY_END_MINUTES = 24 * 60;

export const FULL_DAY: TimeInterval = {
  startMinutes: DAY_START_MINUTES,
  endMinutes: DAY_END_MINUTES,
};

export function intervalMinutes(interval: TimeInterval): number {
  return Math.max(0, interval.endMinutes - interval.startMinutes);
}

/**
 * Sort by start, then by end. Returns a new array.
 */
export function sortIntervals<T extends TimeInterval>(intervals: readonly T[]): T[] {
  return [...intervals].sort(
    (a, b) => a.startMinutes - b.startMinutes || a.endMinutes - b.endMinutes
  );
}

/**
 * Merge overlapping or touching intervals into maximal runs, in start order.
 */
export function mergeIntervals(intervals: readonly TimeInterval[]): TimeInterval[] {
  const merged: TimeInterval[] = [];

  for (const interval of sortIntervals(intervals)) {
    const last = merged[merged.length - 1];
    if (last && interval.startMinutes <= last.endMinutes) {
      last.endMinutes = Math.max(last.endMinutes, interval.endMinutes);
    } else {
      merged.push({ startMinutes: interval.startMinutes, endMinutes: interval.endMinutes });
    }
  }

  return merged;
}

/**
 * Remove `closed` from `span` and return the remaining gaps in start order.
 *
 * Closed intervals are clipped to the span first; an empty result means the
 * span is fully covered.
 */
export function subtractIntervals(
  span: TimeInterval,
  closed: readonly TimeInterval[]
): TimeInterval[] {
  const clipped = closed
    .map(interval => ({
      startMinutes: Math.max(interval.startMinutes, span.startMinutes),
      endMinutes: Math.min(interval.endMinutes, span.endMinutes),
    }))
    .filter(interval => interval.endMinutes > interval.startMinutes);

  const gaps: TimeInterval[] = [];
  let cursor = span.startMinutes;

  for (const run of mergeIntervals(clipped)) {
    if (run.startMinutes > cursor) {
      gaps.push({ startMinutes: cursor, endMinutes: run.startMinutes });
    }
    cursor = Math.max(cursor, run.endMinutes);
  }

  if (span.endMinutes > cursor) {
    gaps.push({ startMinutes: cursor, endMinutes: span.endMinutes });
  }

  return gaps;
}

/**
 * Free time of a whole day once `closed` is taken out.
 */
export function freeIntervalsOfDay(closed: readonly TimeInterval[]): TimeInterval[] {
  return subtractIntervals(FULL_DAY, closed);
}
