import { getDb } from '@/lib/db';
import { planTasks, type NewPlanTaskRow } from '@/db/schema/plan_tasks';
import { planClosedSlots, type NewPlanClosedSlotRow } from '@/db/schema/plan_closed_slots';
import { planSettings } from '@/db/schema/plan_settings';
import { eq } from 'drizzle-orm';
import { ok, err } from '@/lib/result';
import type { Result } from '@/lib/result';
import type { SavedPlan } from '@/lib/types/plans';
import type { ClosedSlotPayload, PlanPayload } from '@/lib/validators/scheduler';

function closedSlotToRow(
  planId: string,
  slot: ClosedSlotPayload,
  position: number
): NewPlanClosedSlotRow {
  return {
    planId,
    position,
    startHour: slot.startHour,
    startMinute: slot.startMinute,
    endHour: slot.endHour,
    endMinute: slot.endMinute,
    appliesTo: slot.appliesTo,
    weekdays: slot.appliesTo === 'weekdays' ? slot.weekdays : null,
    specificDate: slot.appliesTo === 'specific_date' ? slot.specificDate : null,
    label: slot.label ?? null,
  };
}

/**
 * Replaces the stored plan with `plan`.
 * Tasks, closed slots and settings are rewritten in one transaction.
 *
 * @param planId - Plan key
 * @param plan - Parsed transport payload
 * @returns Result containing the saved plan or an error
 */
export async function savePlan(planId: string, plan: PlanPayload): Promise<Result<SavedPlan>> {
  try {
    const savedAt = new Date();

    await getDb().transaction(async (tx) => {
      await tx.delete(planTasks).where(eq(planTasks.planId, planId));
      await tx.delete(planClosedSlots).where(eq(planClosedSlots.planId, planId));

      const taskRows: NewPlanTaskRow[] = plan.tasks.map((task, position) => ({
        planId,
        taskId: task.id,
        position,
        name: task.name,
        totalHours: task.totalHours,
        hoursPerSession: task.hoursPerSession,
        priority: task.priority,
        deadlineDay: task.deadlineDay,
        hoursCompleted: task.hoursCompleted,
        inProgress: task.inProgress,
      }));
      if (taskRows.length > 0) {
        await tx.insert(planTasks).values(taskRows);
      }

      const slotRows = plan.closedSlots.map((slot, position) => closedSlotToRow(planId, slot, position));
      if (slotRows.length > 0) {
        await tx.insert(planClosedSlots).values(slotRows);
      }

      const settings = {
        bufferMinutes: plan.config.bufferMinutes,
        maxNewTaskStartsPerDay: plan.config.maxNewTaskStartsPerDay,
        startDate: plan.config.startDate,
        maxDays: plan.config.maxDays ?? null,
        savedAt,
      };
      await tx
        .insert(planSettings)
        .values({ planId, ...settings })
        .onConflictDoUpdate({ target: planSettings.planId, set: settings });
    });

    return ok({ planId, savedAt: savedAt.toISOString(), plan });
  } catch (error) {
    console.error('Error saving plan:', { planId, error });
    return err('INTERNAL_ERROR', 'Failed to save plan', error instanceof Error ? error.message : error);
  }
}
