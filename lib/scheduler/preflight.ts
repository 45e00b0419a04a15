/**
 * Pre-flight feasibility checks.
 *
 * Reads tasks and closed slots only; task progress is never written here.
 */

import { longestBlockMinutes, resolveAvailability } from './availability';
import { addDays } from './dates';
import { formatHours, hoursToMinutes, minutesToHours } from './format';
import { isComplete, remainingHours, remainingSessions } from './ranking';
import type { ClosedTimeSlot, Task } from './types';

/**
 * Longest free block (minutes) on any day of the horizon.
 */
export function longestBlockInHorizon(
  closedSlots: readonly ClosedTimeSlot[],
  startDate: string,
  horizonDays: number
): number {
  let longest = 0;
  for (let offset = 0; offset < horizonDays; offset++) {
    const blocks = resolveAvailability(addDays(startDate, offset), closedSlots);
    longest = Math.max(longest, longestBlockMinutes(blocks));
  }
  return longest;
}

export function preflightWarnings({
  tasks,
  closedSlots,
  startDate,
  horizonDays,
}: {
  tasks: readonly Task[];
  closedSlots: readonly ClosedTimeSlot[];
  startDate: string;
  horizonDays: number;
}): string[] {
  const pending = tasks.filter(task => !isComplete(task));
  if (pending.length === 0) return [];

  const warnings: string[] = [];
  const longest = longestBlockInHorizon(closedSlots, startDate, horizonDays);

  if (longest === 0) {
    warnings.push(`Every day in the ${horizonDays}-day horizon is fully closed; nothing can be scheduled`);
  }

  for (const task of pending) {
    const sessionHours = Math.min(task.hoursPerSession, remainingHours(task));
    if (longest > 0 && hoursToMinutes(sessionHours) > longest) {
      warnings.push(
        `Task '${task.name}' requires ${formatHours(sessionHours)} per session, ` +
          `but the longest available block is ${formatHours(minutesToHours(longest))}`
      );
    }

    const sessions = remainingSessions(task);
    if (sessions > task.deadlineDay) {
      warnings.push(
        `Task '${task.name}' needs ${sessions} more sessions but its deadline is day ${task.deadlineDay}`
      );
    }
  }

  return warnings;
}
