/**
 * lib/scheduler/types.ts
 *
 * Domain model for the session planner.
 *
 * Conventions:
 * - Times of day are integer minutes from midnight, 0..1440
 * - Calendar days are day keys in YYYY-MM-DD form
 * - Day numbers are 1-based offsets from the schedule start
 */

export const PRIORITY = {
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
} as const;

export type Priority = (typeof PRIORITY)[keyof typeof PRIORITY];

export const PRIORITY_LABELS: Record<Priority, string> = {
  1: 'High',
  2: 'Medium',
  3: 'Low',
};

/**
 * Weekday indices run Monday = 0 through Sunday = 6.
 */
export type ClosedSlotScope =
  | { kind: 'all_days' }
  | { kind: 'weekdays'; weekdays: readonly number[] }
  | { kind: 'specific_date'; date: string };

export type ClosedSlotScopeKind = ClosedSlotScope['kind'];

/**
 * Unavailable interval [startMinutes, endMinutes) on every day its scope selects.
 */
export interface ClosedTimeSlot {
  startMinutes: number;
  endMinutes: number;
  scope: ClosedSlotScope;
  label?: string;
}

export type TimeInterval = {
  startMinutes: number;
  endMinutes: number;
};

/**
 * Free time on one date. Recomputed every time a day is evaluated.
 */
export type AvailableBlock = TimeInterval & {
  date: string;
};

export interface Task {
  id: number;
  name: string;
  totalHours: number;
  hoursPerSession: number;
  priority: Priority;
  /** Inclusive day number by which the task should be finished */
  deadlineDay: number;
  hoursCompleted: number;
  inProgress: boolean;
}

/**
 * Private, mutable copy of a task owned by a single run.
 * `position` is the task's index in the caller's list and breaks ranking ties.
 */
export type WorkingTask = Task & {
  readonly position: number;
};

export interface ScheduledSession {
  taskId: number;
  taskName: string;
  dayNumber: number;
  date: string;
  startMinutes: number;
  endMinutes: number;
  startTime: string;
  endTime: string;
  durationHours: number;
  priority: Priority;
  hoursCompletedAfter: number;
  totalHours: number;
  /** e.g. "3.0/6.0" */
  progress: string;
}

export type DeferralReason = 'start_cap';

/**
 * A task held back without a placement attempt.
 * Kept apart from warnings so a start-cap deferral is never mistaken
 * for a failed placement.
 */
export interface DeferredTask {
  taskId: number;
  taskName: string;
  reason: DeferralReason;
}

export interface DaySchedule {
  dayNumber: number;
  date: string;
  /** e.g. "Thursday, February 15, 2024" */
  dateLabel: string;
  sessions: ScheduledSession[];
  warnings: string[];
  deferred: DeferredTask[];
}

export interface SchedulerConfig {
  bufferMinutes: number;
  maxNewTaskStartsPerDay: number;
  /** "now" or a YYYY-MM-DD day key */
  startDate: string;
  /** Horizon in days; derived from deadlines when omitted */
  maxDays?: number;
}

/**
 * Inputs used only to resolve `startDate: "now"`.
 */
export interface ScheduleOptions {
  now?: Date;
  timeZone?: string;
}

export interface TaskProgress {
  taskId: number;
  taskName: string;
  hoursCompleted: number;
  totalHours: number;
  inProgress: boolean;
  completed: boolean;
}

export interface ScheduleOutcome {
  startDate: string;
  horizonDays: number;
  days: DaySchedule[];
  /** Pre-flight warnings followed by horizon-exhaustion warnings */
  warnings: string[];
  tasks: TaskProgress[];
  completed: boolean;
}
