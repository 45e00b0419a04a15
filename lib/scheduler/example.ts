import { SCHEDULER_DEFAULTS } from '@/config/scheduler';
import type { PlanInput } from '@/lib/validators/scheduler';

/**
 * Sample plan served by GET /api/example: nights, meals and a weekend
 * lie-in closed, two high-priority tasks with different deadlines.
 */
export const EXAMPLE_PLAN = {
  closedSlots: [
    { startHour: 0, startMinute: 0, endHour: 8, endMinute: 0, appliesTo: 'all_days', label: 'Sleep' },
    { startHour: 22, startMinute: 0, endHour: 24, endMinute: 0, appliesTo: 'all_days', label: 'Sleep' },
    { startHour: 12, startMinute: 0, endHour: 13, endMinute: 0, appliesTo: 'all_days', label: 'Lunch' },
    { startHour: 20, startMinute: 0, endHour: 21, endMinute: 0, appliesTo: 'all_days', label: 'Dinner' },
    {
      startHour: 8,
      startMinute: 0,
      endHour: 10,
      endMinute: 0,
      appliesTo: 'weekdays',
      weekdays: [5, 6],
      label: 'Weekend lie-in',
    },
  ],
  tasks: [
    {
      id: 1,
      name: 'Complete Project Report',
      totalHours: 10,
      hoursPerSession: 2,
      priority: 1,
      deadlineDay: 10,
    },
    {
      id: 2,
      name: 'Study for Exam',
      totalHours: 9,
      hoursPerSession: 3,
      priority: 1,
      deadlineDay: 7,
    },
  ],
  config: {
    bufferMinutes: SCHEDULER_DEFAULTS.BUFFER_MINUTES,
    maxNewTaskStartsPerDay: SCHEDULER_DEFAULTS.MAX_NEW_TASK_STARTS_PER_DAY,
    startDate: 'now',
  },
} satisfies PlanInput;
