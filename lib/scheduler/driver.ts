/**
 * lib/scheduler/driver.ts
 *
 * Day loop. Starts at day 1 on the resolved start date and keeps allocating
 * until every working task is complete or the horizon is used up.
 *
 * Day N+1 is only resolved and ranked after day N is committed, because
 * day N's progress feeds day N+1's urgency.
 */

import { allocateDay } from './allocator';
import { addDays } from './dates';
import { formatProgress } from './format';
import { isComplete } from './ranking';
import type {
  ClosedTimeSlot,
  DaySchedule,
  SchedulerConfig,
  Task,
  TaskProgress,
  WorkingTask,
} from './types';

/**
 * Private copies of the caller's tasks. The caller's objects are never touched.
 */
export function toWorkingTasks(tasks: readonly Task[]): WorkingTask[] {
  return tasks.map((task, position) => ({ ...task, position }));
}

export function horizonWarning(task: WorkingTask, horizonDays: number): string {
  return (
    `'${task.name}' was not completed within ${horizonDays} days ` +
    `(${formatProgress(task.hoursCompleted, task.totalHours)} hours completed)`
  );
}

export function toTaskProgress(task: WorkingTask): TaskProgress {
  return {
    taskId: task.id,
    taskName: task.name,
    hoursCompleted: task.hoursCompleted,
    totalHours: task.totalHours,
    inProgress: task.inProgress,
    completed: isComplete(task),
  };
}

export type DriverResult = {
  days: DaySchedule[];
  /** Horizon-exhaustion warnings, one per task left incomplete */
  warnings: string[];
};

export function runSchedule({
  tasks,
  closedSlots,
  config,
  startDate,
  horizonDays,
}: {
  tasks: WorkingTask[];
  closedSlots: readonly ClosedTimeSlot[];
  config: Pick<SchedulerConfig, 'bufferMinutes' | 'maxNewTaskStartsPerDay'>;
  startDate: string;
  horizonDays: number;
}): DriverResult {
  const days: DaySchedule[] = [];
  let dayNumber = 0;

  while (tasks.some(task => !isComplete(task)) && dayNumber < horizonDays) {
    dayNumber += 1;
    days.push(
      allocateDay({
        dayNumber,
        date: addDays(startDate, dayNumber - 1),
        tasks,
        closedSlots,
        config,
      })
    );
  }

  const warnings = tasks
    .filter(task => !isComplete(task))
    .map(task => horizonWarning(task, horizonDays));

  return { days, warnings };
}
