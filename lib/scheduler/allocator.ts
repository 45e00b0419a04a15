/**
 * lib/scheduler/allocator.ts
 *
 * Allocates a single day.
 *
 * Flow:
 * 1. Resolve the date's free blocks
 * 2. Rank the incomplete working tasks
 * 3. Walk the ranking: flag overdue work, cap new starts, place sessions
 *
 * Working tasks are owned by the calling run and are updated in place.
 */

import { longestBlockMinutes, resolveAvailability } from './availability';
import { formatDateLabel } from './dates';
import {
  formatClock,
  formatHours,
  formatProgress,
  hoursToMinutes,
  minutesToHours,
  roundHours,
} from './format';
import { placeSession } from './placement';
import { isComplete, rankTasks, remainingHours } from './ranking';
import type {
  ClosedTimeSlot,
  DaySchedule,
  DeferredTask,
  ScheduledSession,
  SchedulerConfig,
  WorkingTask,
} from './types';

export function deadlineWarning(task: WorkingTask): string {
  return (
    `'${task.name}' is past its deadline (day ${task.deadlineDay}) ` +
    `with ${formatProgress(task.hoursCompleted, task.totalHours)} hours completed`
  );
}

export function placementWarning(task: WorkingTask, sessionHours: number, longestMinutes: number): string {
  return (
    `Cannot place '${task.name}': needs ${formatHours(sessionHours)} of contiguous free time, ` +
    `longest free block is ${formatHours(minutesToHours(longestMinutes))}`
  );
}

/**
 * Hours the next session of `task` will take: a full session, or the exact
 * remainder when less than a full session is left.
 */
export function nextSessionHours(task: WorkingTask): number {
  return Math.min(task.hoursPerSession, remainingHours(task));
}

export function allocateDay({
  dayNumber,
  date,
  tasks,
  closedSlots,
  config,
}: {
  dayNumber: number;
  date: string;
  tasks: WorkingTask[];
  closedSlots: readonly ClosedTimeSlot[];
  config: Pick<SchedulerConfig, 'bufferMinutes' | 'maxNewTaskStartsPerDay'>;
}): DaySchedule {
  let blocks = resolveAvailability(date, closedSlots);
  const sessions: ScheduledSession[] = [];
  const warnings: string[] = [];
  const deferred: DeferredTask[] = [];
  let newStarts = 0;

  for (const task of rankTasks(tasks, dayNumber)) {
    const isNewStart = !task.inProgress;

    if (dayNumber > task.deadlineDay) {
      warnings.push(deadlineWarning(task));
    }

    if (isNewStart && newStarts >= config.maxNewTaskStartsPerDay) {
      deferred.push({ taskId: task.id, taskName: task.name, reason: 'start_cap' });
      continue;
    }

    const sessionHours = nextSessionHours(task);
    const result = placeSession({
      durationMinutes: Math.max(1, hoursToMinutes(sessionHours)),
      blocks,
      bufferMinutes: config.bufferMinutes,
    });

    if (!result.placement) {
      warnings.push(placementWarning(task, sessionHours, longestBlockMinutes(blocks)));
      continue;
    }

    blocks = result.blocks;
    task.hoursCompleted = Math.min(task.totalHours, roundHours(task.hoursCompleted + sessionHours));
    task.inProgress = !isComplete(task);
    if (isNewStart) newStarts += 1;

    sessions.push({
      taskId: task.id,
      taskName: task.name,
      dayNumber,
      date,
      startMinutes: result.placement.startMinutes,
      endMinutes: result.placement.endMinutes,
      startTime: formatClock(result.placement.startMinutes),
      endTime: formatClock(result.placement.endMinutes),
      durationHours: sessionHours,
      priority: task.priority,
      hoursCompletedAfter: task.hoursCompleted,
      totalHours: task.totalHours,
      progress: formatProgress(task.hoursCompleted, task.totalHours),
    });
  }

  sessions.sort((a, b) => a.startMinutes - b.startMinutes);

  return {
    dayNumber,
    date,
    dateLabel: formatDateLabel(date),
    sessions,
    warnings,
    deferred,
  };
}
