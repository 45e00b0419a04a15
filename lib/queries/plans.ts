import { getDb } from '@/lib/db';
import { planTasks } from '@/db/schema/plan_tasks';
import { planClosedSlots, type PlanClosedSlotRow } from '@/db/schema/plan_closed_slots';
import { planSettings } from '@/db/schema/plan_settings';
import { eq, asc } from 'drizzle-orm';
import { ok, err } from '@/lib/result';
import type { Result } from '@/lib/result';
import type { SavedPlan } from '@/lib/types/plans';
import { planSchema } from '@/lib/validators/scheduler';

function closedSlotRowToPayload(row: PlanClosedSlotRow): Record<string, unknown> {
  const slot: Record<string, unknown> = {
    startHour: row.startHour,
    startMinute: row.startMinute,
    endHour: row.endHour,
    endMinute: row.endMinute,
    appliesTo: row.appliesTo,
  };
  if (row.appliesTo === 'weekdays') slot.weekdays = row.weekdays ?? [];
  if (row.appliesTo === 'specific_date') slot.specificDate = row.specificDate ?? '';
  if (row.label !== null) slot.label = row.label;
  return slot;
}

/**
 * Loads a saved plan, re-validated against the transport schema.
 *
 * @param planId - Plan key
 * @returns Result containing the plan, null when nothing is saved, or an error
 */
export async function getPlan(planId: string): Promise<Result<SavedPlan | null>> {
  try {
    const db = getDb();

    const [settings] = await db
      .select()
      .from(planSettings)
      .where(eq(planSettings.planId, planId))
      .limit(1);

    if (!settings) return ok(null);

    const taskRows = await db
      .select()
      .from(planTasks)
      .where(eq(planTasks.planId, planId))
      .orderBy(asc(planTasks.position));

    const slotRows = await db
      .select()
      .from(planClosedSlots)
      .where(eq(planClosedSlots.planId, planId))
      .orderBy(asc(planClosedSlots.position));

    const config: Record<string, unknown> = {
      bufferMinutes: settings.bufferMinutes,
      maxNewTaskStartsPerDay: settings.maxNewTaskStartsPerDay,
      startDate: settings.startDate,
    };
    if (settings.maxDays !== null) config.maxDays = settings.maxDays;

    const parsed = planSchema.safeParse({
      tasks: taskRows.map(row => ({
        id: row.taskId,
        name: row.name,
        totalHours: row.totalHours,
        hoursPerSession: row.hoursPerSession,
        priority: row.priority,
        deadlineDay: row.deadlineDay,
        hoursCompleted: row.hoursCompleted,
        inProgress: row.inProgress,
      })),
      closedSlots: slotRows.map(closedSlotRowToPayload),
      config,
    });

    if (!parsed.success) {
      return err('INTERNAL_ERROR', `Stored plan '${planId}' is invalid`, parsed.error.issues);
    }

    return ok({
      planId,
      savedAt: settings.savedAt.toISOString(),
      plan: parsed.data,
    });
  } catch (error) {
    console.error('Error loading plan:', { planId, error });
    return err('INTERNAL_ERROR', 'Failed to load plan', error instanceof Error ? error.message : error);
  }
}
