/**
 * lib/scheduler/ranking.ts
 *
 * Orders a day's candidate tasks.
 *
 * Key, compared field by field:
 * 1. inProgress  - started tasks first
 * 2. urgency     - deadlineDay - remainingSessions - dayNumber, lower first
 * 3. priority    - High (1) before Low (3)
 * 4. position    - input order, so the order is total
 */

import { roundHours } from './format';
import type { Priority, Task, WorkingTask } from './types';

export type RankKey = {
  inProgress: boolean;
  urgency: number;
  priority: Priority;
  position: number;
};

type RankField = keyof RankKey;

const RANK_FIELDS: readonly RankField[] = ['inProgress', 'urgency', 'priority', 'position'];

export function remainingHours(task: Pick<Task, 'totalHours' | 'hoursCompleted'>): number {
  return Math.max(0, roundHours(task.totalHours - task.hoursCompleted));
}

export function isComplete(task: Pick<Task, 'totalHours' | 'hoursCompleted'>): boolean {
  return task.hoursCompleted >= task.totalHours;
}

export function remainingSessions(
  task: Pick<Task, 'totalHours' | 'hoursCompleted' | 'hoursPerSession'>
): number {
  return Math.ceil(roundHours(remainingHours(task) / task.hoursPerSession));
}

/**
 * Slack in days between the deadline and the sessions still needed.
 * Negative means the task can no longer finish on time even with a
 * session every day.
 */
export function urgencyScore(
  task: Pick<Task, 'totalHours' | 'hoursCompleted' | 'hoursPerSession' | 'deadlineDay'>,
  dayNumber: number
): number {
  return task.deadlineDay - remainingSessions(task) - dayNumber;
}

export function rankKeyFor(task: WorkingTask, dayNumber: number): RankKey {
  return {
    inProgress: task.inProgress,
    urgency: urgencyScore(task, dayNumber),
    priority: task.priority,
    position: task.position,
  };
}

function compareField(field: RankField, a: RankKey, b: RankKey): number {
  switch (field) {
    case 'inProgress':
      return Number(b.inProgress) - Number(a.inProgress);
    case 'urgency':
      return a.urgency - b.urgency;
    case 'priority':
      return a.priority - b.priority;
    case 'position':
      return a.position - b.position;
  }
}

/**
 * Negative when `a` ranks before `b`. Zero only for identical keys.
 */
export function compareRankKeys(a: RankKey, b: RankKey): number {
  for (const field of RANK_FIELDS) {
    const result = compareField(field, a, b);
    if (result !== 0) return result;
  }
  return 0;
}

/**
 * Incomplete tasks in placement order for `dayNumber`. Returns a new array
 * holding the same working task objects.
 */
export function rankTasks(tasks: readonly WorkingTask[], dayNumber: number): WorkingTask[] {
  return tasks
    .filter(task => !isComplete(task))
    .map(task => ({ task, key: rankKeyFor(task, dayNumber) }))
    .sort((a, b) => compareRankKeys(a.key, b.key))
    .map(entry => entry.task);
}
