import { withRoute } from '@/lib/api/withRoute';
import { parseJsonBody, readPlanId } from '@/lib/api/body';
import { SCHEDULER_DEFAULTS } from '@/config/scheduler';
import { err, ok } from '@/lib/result';
import { getPlanStore } from '@/lib/storage/planStore';
import { planIdSchema, planSchema } from '@/lib/validators/scheduler';

/**
 * POST /api/plan?planId=...
 * Saves a plan (tasks, closed slots and config) as sent.
 *
 * Body: PlanInput (JSON)
 */
export const POST = withRoute(async (req: Request) => {
  const planId = readPlanId(req, planIdSchema, SCHEDULER_DEFAULTS.PLAN_ID);
  if (!planId.ok) return planId;

  const plan = await parseJsonBody(req, planSchema);
  if (!plan.ok) return plan;

  const saved = await getPlanStore().savePlan(planId.data, plan.data);
  if (!saved.ok) return saved;

  console.info('Plan saved:', {
    planId: planId.data,
    tasks: plan.data.tasks.length,
    closedSlots: plan.data.closedSlots.length,
  });

  return ok(saved.data);
});

/**
 * GET /api/plan?planId=...
 */
export const GET = withRoute(async (req: Request) => {
  const planId = readPlanId(req, planIdSchema, SCHEDULER_DEFAULTS.PLAN_ID);
  if (!planId.ok) return planId;

  const saved = await getPlanStore().loadPlan(planId.data);
  if (!saved.ok) return saved;
  if (!saved.data) {
    return err('NOT_FOUND', `No saved plan '${planId.data}'`);
  }

  return ok(saved.data);
});
