import { z } from 'zod';
import { SCHEDULER_DEFAULTS } from '@/config/scheduler';

/**
 * Transport schemas for plans exchanged with the request and persistence layers.
 *
 * These check shape only. Range rules (start before end, positive hours,
 * weekdays 0-6, ...) belong to the scheduler's configuration check so that
 * direct callers of the core get the same errors.
 */

const clockFields = {
  startHour: z.number().int(),
  startMinute: z.number().int().default(0),
  endHour: z.number().int(),
  endMinute: z.number().int().default(0),
  label: z.string().optional(),
};

/**
 * Closed time slot, discriminated on `appliesTo`.
 * Weekdays: 0 = Monday ... 6 = Sunday.
 */
export const closedSlotSchema = z.discriminatedUnion('appliesTo', [
  z.object({
    ...clockFields,
    appliesTo: z.literal('all_days'),
  }),
  z.object({
    ...clockFields,
    appliesTo: z.literal('weekdays'),
    weekdays: z.array(z.number().int()),
  }),
  z.object({
    ...clockFields,
    appliesTo: z.literal('specific_date'),
    specificDate: z.string(),
  }),
]);

export const prioritySchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const planTaskSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1, 'Task name is required'),
  totalHours: z.number(),
  hoursPerSession: z.number(),
  priority: prioritySchema,
  deadlineDay: z.number().int(),
  hoursCompleted: z.number().default(0),
  inProgress: z.boolean().default(false),
});

export const schedulerConfigSchema = z.object({
  bufferMinutes: z.number().default(SCHEDULER_DEFAULTS.BUFFER_MINUTES),
  maxNewTaskStartsPerDay: z.number().int().default(SCHEDULER_DEFAULTS.MAX_NEW_TASK_STARTS_PER_DAY),
  startDate: z.string().default('now'),
  maxDays: z.number().int().optional(),
});

/**
 * Full plan: what the schedule and validate routes accept and what the
 * plan store persists.
 */
export const planSchema = z.object({
  tasks: z.array(planTaskSchema),
  closedSlots: z.array(closedSlotSchema),
  config: schedulerConfigSchema.default({}),
});

/**
 * Plan key used by the persistence routes; doubles as a file name.
 */
export const planIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, 'planId may only contain letters, digits, "-" and "_" (max 64)');

const scheduledSessionSchema = z.object({
  taskId: z.number().int(),
  taskName: z.string(),
  dayNumber: z.number().int(),
  date: z.string(),
  startMinutes: z.number().int(),
  endMinutes: z.number().int(),
  startTime: z.string(),
  endTime: z.string(),
  durationHours: z.number(),
  priority: prioritySchema,
  hoursCompletedAfter: z.number(),
  totalHours: z.number(),
  progress: z.string(),
});

const daySchedulePayloadSchema = z.object({
  dayNumber: z.number().int(),
  date: z.string(),
  dateLabel: z.string(),
  sessions: z.array(scheduledSessionSchema),
  warnings: z.array(z.string()),
  deferred: z.array(
    z.object({
      taskId: z.number().int(),
      taskName: z.string(),
      reason: z.literal('start_cap'),
    })
  ),
});

/**
 * Stored schedule run, re-checked when read back from disk.
 */
export const scheduleOutcomeSchema = z.object({
  startDate: z.string(),
  horizonDays: z.number().int(),
  days: z.array(daySchedulePayloadSchema),
  warnings: z.array(z.string()),
  tasks: z.array(
    z.object({
      taskId: z.number().int(),
      taskName: z.string(),
      hoursCompleted: z.number(),
      totalHours: z.number(),
      inProgress: z.boolean(),
      completed: z.boolean(),
    })
  ),
  completed: z.boolean(),
});

// Export inferred types
export type ClosedSlotPayload = z.infer<typeof closedSlotSchema>;
export type PlanTaskPayload = z.infer<typeof planTaskSchema>;
export type SchedulerConfigPayload = z.infer<typeof schedulerConfigSchema>;
export type PlanPayload = z.infer<typeof planSchema>;
export type PlanInput = z.input<typeof planSchema>;
