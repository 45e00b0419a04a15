/**
 * lib/scheduler/index.ts
 *
 * Public entry points of the session planner.
 *
 * Both calls are synchronous and read no clock, file or network; `options.now`
 * is only consulted when `config.startDate` is "now".
 */

import { getSchedulerTimeZone } from '@/config/scheduler';
import { ok, type Result } from '@/lib/result';
import { checkConfiguration } from './configuration';
import { runSchedule, toTaskProgress, toWorkingTasks } from './driver';
import { preflightWarnings } from './preflight';
import type {
  ClosedTimeSlot,
  ScheduleOptions,
  ScheduleOutcome,
  SchedulerConfig,
  Task,
} from './types';

function resolveOptions(options: ScheduleOptions): Required<ScheduleOptions> {
  return {
    now: options.now ?? new Date(),
    timeZone: options.timeZone ?? getSchedulerTimeZone(),
  };
}

/**
 * Pre-flight check. Runs the same availability and feasibility analysis as
 * `schedule` without creating working copies or touching task progress.
 *
 * @returns Warning strings, or CONFIGURATION_ERROR
 */
export function validate(
  tasks: readonly Task[],
  closedSlots: readonly ClosedTimeSlot[],
  config: SchedulerConfig,
  options: ScheduleOptions = {}
): Result<string[]> {
  const checked = checkConfiguration(tasks, closedSlots, config, resolveOptions(options));
  if (!checked.ok) return checked;

  return ok(
    preflightWarnings({
      tasks,
      closedSlots,
      startDate: checked.data.startDate,
      horizonDays: checked.data.horizonDays,
    })
  );
}

/**
 * Full run. The caller's tasks are cloned; the returned `tasks` holds the
 * final progress of the run's own copies.
 */
export function schedule(
  tasks: readonly Task[],
  closedSlots: readonly ClosedTimeSlot[],
  config: SchedulerConfig,
  options: ScheduleOptions = {}
): Result<ScheduleOutcome> {
  const checked = checkConfiguration(tasks, closedSlots, config, resolveOptions(options));
  if (!checked.ok) return checked;

  const { startDate, horizonDays } = checked.data;
  const preflight = preflightWarnings({ tasks, closedSlots, startDate, horizonDays });

  const working = toWorkingTasks(tasks);
  const { days, warnings } = runSchedule({
    tasks: working,
    closedSlots,
    config,
    startDate,
    horizonDays,
  });

  const progress = working.map(toTaskProgress);

  return ok({
    startDate,
    horizonDays,
    days,
    warnings: [...preflight, ...warnings],
    tasks: progress,
    completed: progress.every(task => task.completed),
  });
}

export { resolveAvailability, slotAppliesTo } from './availability';
export { mergeIntervals, subtractIntervals, sortIntervals } from './intervals';
export { compareRankKeys, rankTasks, urgencyScore } from './ranking';
export { placeSession } from './placement';
export { allocateDay } from './allocator';
export { runSchedule } from './driver';
export * from './types';
