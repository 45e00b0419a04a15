import { withRoute } from '@/lib/api/withRoute';
import { parseJsonBody, readPlanId } from '@/lib/api/body';
import { SCHEDULER_DEFAULTS } from '@/config/scheduler';
import { err, ok } from '@/lib/result';
import { schedule } from '@/lib/scheduler';
import { toSchedulerInput } from '@/lib/scheduler/payload';
import { getPlanStore } from '@/lib/storage/planStore';
import { planIdSchema, planSchema } from '@/lib/validators/scheduler';

/**
 * POST /api/schedule?planId=...
 * Generates a schedule and records it as the plan's latest run.
 *
 * Body: PlanInput (JSON)
 */
export const POST = withRoute(async (req: Request) => {
  const planId = readPlanId(req, planIdSchema, SCHEDULER_DEFAULTS.PLAN_ID);
  if (!planId.ok) return planId;

  const plan = await parseJsonBody(req, planSchema);
  if (!plan.ok) return plan;
  if (plan.data.tasks.length === 0) {
    return err('VALIDATION_ERROR', 'At least one task is required');
  }

  const { tasks, closedSlots, config } = toSchedulerInput(plan.data);
  const outcome = schedule(tasks, closedSlots, config);
  if (!outcome.ok) return outcome;

  const saved = await getPlanStore().saveRun(planId.data, outcome.data);
  if (!saved.ok) return saved;

  console.info('Schedule generated:', {
    planId: planId.data,
    startDate: outcome.data.startDate,
    totalDays: outcome.data.days.length,
    completed: outcome.data.completed,
    warnings: outcome.data.warnings.length,
  });

  return ok({
    planId: planId.data,
    savedAt: saved.data.savedAt,
    totalDays: outcome.data.days.length,
    ...outcome.data,
  });
});

/**
 * GET /api/schedule?planId=...
 * Returns the plan's latest recorded run.
 */
export const GET = withRoute(async (req: Request) => {
  const planId = readPlanId(req, planIdSchema, SCHEDULER_DEFAULTS.PLAN_ID);
  if (!planId.ok) return planId;

  const run = await getPlanStore().loadLatestRun(planId.data);
  if (!run.ok) return run;
  if (!run.data) {
    return err('NOT_FOUND', `No saved schedule for plan '${planId.data}'`);
  }

  return ok({
    planId: run.data.planId,
    savedAt: run.data.savedAt,
    totalDays: run.data.outcome.days.length,
    ...run.data.outcome,
  });
});
