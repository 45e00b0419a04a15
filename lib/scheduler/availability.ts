/**
 * lib/scheduler/availability.ts
 *
 * Resolves a date's free blocks from the full closed-slot set.
 *
 * Rules:
 * - A slot applies when its scope selects the date
 * - Applicable slots from every scope are pooled before merging;
 *   scope filters, it never ranks
 */

import { weekdayIndex } from './dates';
import { freeIntervalsOfDay, intervalMinutes } from './intervals';
import type { AvailableBlock, ClosedTimeSlot, TimeInterval } from './types';

export function slotAppliesTo(slot: ClosedTimeSlot, dayKey: string): boolean {
  const { scope } = slot;
  switch (scope.kind) {
    case 'all_days':
      return true;
    case 'weekdays':
      return scope.weekdays.includes(weekdayIndex(dayKey));
    case 'specific_date':
      return scope.date === dayKey;
  }
}

/**
 * Closed intervals that apply on `dayKey`, unmerged.
 */
export function closedIntervalsFor(
  dayKey: string,
  closedSlots: readonly ClosedTimeSlot[]
): TimeInterval[] {
  return closedSlots
    .filter(slot => slotAppliesTo(slot, dayKey))
    .map(slot => ({ startMinutes: slot.startMinutes, endMinutes: slot.endMinutes }));
}

/**
 * Ordered, non-overlapping free blocks for `dayKey`.
 * An empty list is a valid answer: the whole day is closed.
 */
export function resolveAvailability(
  dayKey: string,
  closedSlots: readonly ClosedTimeSlot[]
): AvailableBlock[] {
  return freeIntervalsOfDay(closedIntervalsFor(dayKey, closedSlots)).map(interval => ({
    date: dayKey,
    startMinutes: interval.startMinutes,
    endMinutes: interval.endMinutes,
  }));
}

export function longestBlockMinutes(blocks: readonly TimeInterval[]): number {
  return blocks.reduce((longest, block) => Math.max(longest, intervalMinutes(block)), 0);
}
