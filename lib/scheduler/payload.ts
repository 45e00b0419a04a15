/**
 * Conversion between the transport plan (hours/minutes, `appliesTo`) and the
 * scheduler's domain types (minutes from midnight, tagged scope).
 */

import type {
  ClosedSlotPayload,
  PlanPayload,
  PlanTaskPayload,
  SchedulerConfigPayload,
} from '@/lib/validators/scheduler';
import type { ClosedSlotScope, ClosedTimeSlot, SchedulerConfig, Task } from './types';

export type SchedulerInput = {
  tasks: Task[];
  closedSlots: ClosedTimeSlot[];
  config: SchedulerConfig;
};

function toScope(slot: ClosedSlotPayload): ClosedSlotScope {
  switch (slot.appliesTo) {
    case 'all_days':
      return { kind: 'all_days' };
    case 'weekdays':
      return { kind: 'weekdays', weekdays: [...slot.weekdays] };
    case 'specific_date':
      return { kind: 'specific_date', date: slot.specificDate };
  }
}

export function toClosedTimeSlot(slot: ClosedSlotPayload): ClosedTimeSlot {
  const closed: ClosedTimeSlot = {
    startMinutes: slot.startHour * 60 + slot.startMinute,
    endMinutes: slot.endHour * 60 + slot.endMinute,
    scope: toScope(slot),
  };
  if (slot.label) closed.label = slot.label;
  return closed;
}

export function toTask(task: PlanTaskPayload): Task {
  return {
    id: task.id,
    name: task.name,
    totalHours: task.totalHours,
    hoursPerSession: task.hoursPerSession,
    priority: task.priority,
    deadlineDay: task.deadlineDay,
    hoursCompleted: task.hoursCompleted,
    inProgress: task.inProgress,
  };
}

export function toSchedulerConfig(config: SchedulerConfigPayload): SchedulerConfig {
  const converted: SchedulerConfig = {
    bufferMinutes: config.bufferMinutes,
    maxNewTaskStartsPerDay: config.maxNewTaskStartsPerDay,
    startDate: config.startDate,
  };
  if (config.maxDays !== undefined) converted.maxDays = config.maxDays;
  return converted;
}

export function toSchedulerInput(plan: PlanPayload): SchedulerInput {
  return {
    tasks: plan.tasks.map(toTask),
    closedSlots: plan.closedSlots.map(toClosedTimeSlot),
    config: toSchedulerConfig(plan.config),
  };
}
