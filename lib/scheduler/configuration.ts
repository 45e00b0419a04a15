/**
 * Configuration checks run before any scheduling.
 *
 * Every problem is collected so a rejected request lists all of them at once.
 * A single issue fails the whole run; nothing is partially executed.
 */

import { SCHEDULER_DEFAULTS } from '@/config/scheduler';
import { err, ok, type Result } from '@/lib/result';
import { isDayKey, resolveStartDate } from './dates';
import { DAY_END_MINUTES, DAY_START_MINUTES } from './intervals';
import { formatClock } from './format';
import { PRIORITY_LABELS, type ClosedTimeSlot, type ScheduleOptions, type SchedulerConfig, type Task } from './types';

export type ConfigurationCheck = {
  /** Resolved first day of the schedule */
  startDate: string;
  /** Number of days the driver may evaluate */
  horizonDays: number;
};

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function describeSlot(slot: ClosedTimeSlot, index: number): string {
  const label = slot.label ? ` (${slot.label})` : '';
  return `closed slot #${index + 1}${label}`;
}

export function closedSlotIssues(slot: ClosedTimeSlot, index: number): string[] {
  const issues: string[] = [];
  const name = describeSlot(slot, index);
  const { startMinutes, endMinutes, scope } = slot;

  if (!Number.isInteger(startMinutes) || !Number.isInteger(endMinutes)) {
    issues.push(`${name} must start and end on whole minutes`);
  } else if (startMinutes < DAY_START_MINUTES || endMinutes > DAY_END_MINUTES) {
    issues.push(`${name} must lie within 00:00-24:00`);
  } else if (startMinutes >= endMinutes) {
    issues.push(
      `${name} is empty or inverted (${formatClock(startMinutes)}-${formatClock(endMinutes)}); ` +
        'start must be before end on the same day'
    );
  }

  switch (scope.kind) {
    case 'all_days':
      break;
    case 'weekdays':
      if (scope.weekdays.length === 0) {
        issues.push(`${name} applies to weekdays but lists none`);
      }
      for (const weekday of scope.weekdays) {
        if (!Number.isInteger(weekday) || weekday < 0 || weekday > 6) {
          issues.push(`${name} has weekday ${weekday}; weekdays run 0 (Monday) to 6 (Sunday)`);
        }
      }
      break;
    case 'specific_date':
      if (!isDayKey(scope.date)) {
        issues.push(`${name} has invalid date '${scope.date}'; use YYYY-MM-DD`);
      }
      break;
  }

  return issues;
}

export function taskIssues(task: Task): string[] {
  const issues: string[] = [];
  const name = `task '${task.name}'`;

  if (!Number.isInteger(task.id)) {
    issues.push(`${name} must have an integer id`);
  }
  if (!Number.isFinite(task.totalHours) || task.totalHours <= 0) {
    issues.push(`${name} must have totalHours greater than 0`);
  }
  if (!Number.isFinite(task.hoursPerSession) || task.hoursPerSession <= 0) {
    issues.push(`${name} must have hoursPerSession greater than 0`);
  } else if (task.hoursPerSession * 60 < 1) {
    issues.push(`${name} must have sessions of at least one minute`);
  }
  if (!(task.priority in PRIORITY_LABELS)) {
    issues.push(`${name} has unknown priority ${task.priority}; use 1 (High), 2 (Medium) or 3 (Low)`);
  }
  if (!isNonNegativeInteger(task.deadlineDay)) {
    issues.push(`${name} must have a whole, non-negative deadlineDay`);
  }
  if (
    !Number.isFinite(task.hoursCompleted) ||
    task.hoursCompleted < 0 ||
    task.hoursCompleted > task.totalHours
  ) {
    issues.push(`${name} must have hoursCompleted between 0 and totalHours`);
  }

  return issues;
}

/**
 * Horizon used when the config gives none: the latest deadline plus padding.
 */
export function defaultHorizonDays(tasks: readonly Task[]): number {
  const latestDeadline = tasks.reduce((latest, task) => Math.max(latest, task.deadlineDay), 0);
  return Math.min(
    latestDeadline + SCHEDULER_DEFAULTS.HORIZON_PADDING_DAYS,
    SCHEDULER_DEFAULTS.MAX_HORIZON_DAYS
  );
}

/**
 * Validate tasks, closed slots and config together.
 *
 * @returns The resolved start date and horizon, or CONFIGURATION_ERROR with
 *          `details.issues` listing every problem
 */
export function checkConfiguration(
  tasks: readonly Task[],
  closedSlots: readonly ClosedTimeSlot[],
  config: SchedulerConfig,
  options: Required<ScheduleOptions>
): Result<ConfigurationCheck> {
  const issues: string[] = [];

  closedSlots.forEach((slot, index) => issues.push(...closedSlotIssues(slot, index)));

  const seenIds = new Set<number>();
  for (const task of tasks) {
    issues.push(...taskIssues(task));
    if (seenIds.has(task.id)) {
      issues.push(`task id ${task.id} is used more than once`);
    }
    seenIds.add(task.id);
  }

  if (!isNonNegativeInteger(config.maxNewTaskStartsPerDay)) {
    issues.push('maxNewTaskStartsPerDay must be a whole number of 0 or more');
  }
  if (!Number.isFinite(config.bufferMinutes) || config.bufferMinutes < 0) {
    issues.push('bufferMinutes must be 0 or more');
  }
  if (
    config.maxDays !== undefined &&
    (!Number.isInteger(config.maxDays) ||
      config.maxDays < 1 ||
      config.maxDays > SCHEDULER_DEFAULTS.MAX_HORIZON_DAYS)
  ) {
    issues.push(`maxDays must be a whole number from 1 to ${SCHEDULER_DEFAULTS.MAX_HORIZON_DAYS}`);
  }

  const startDate = resolveStartDate(config.startDate, options.now, options.timeZone);
  if (!startDate) {
    issues.push(`startDate '${config.startDate}' cannot be resolved; use "now" or YYYY-MM-DD`);
  }

  if (issues.length > 0 || !startDate) {
    return err(
      'CONFIGURATION_ERROR',
      `Invalid scheduler configuration: ${issues.join('; ')}`,
      { issues }
    );
  }

  return ok({
    startDate,
    horizonDays: config.maxDays ?? defaultHorizonDays(tasks),
  });
}
