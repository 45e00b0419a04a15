import { withRoute } from '@/lib/api/withRoute';
import { parseJsonBody } from '@/lib/api/body';
import { ok } from '@/lib/result';
import { validate } from '@/lib/scheduler';
import { toSchedulerInput } from '@/lib/scheduler/payload';
import { planSchema } from '@/lib/validators/scheduler';

/**
 * POST /api/validate
 * Pre-flight check of a plan. Nothing is scheduled or stored.
 *
 * Body: PlanInput (JSON)
 */
export const POST = withRoute(async (req: Request) => {
  const plan = await parseJsonBody(req, planSchema);
  if (!plan.ok) return plan;

  const { tasks, closedSlots, config } = toSchedulerInput(plan.data);
  const result = validate(tasks, closedSlots, config);
  if (!result.ok) return result;

  return ok({
    warnings: result.data,
    isValid: result.data.length === 0,
  });
});
