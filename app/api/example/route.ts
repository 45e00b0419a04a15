import { withRoute } from '@/lib/api/withRoute';
import { ok } from '@/lib/result';
import { EXAMPLE_PLAN } from '@/lib/scheduler/example';

/**
 * GET /api/example
 * Returns a sample payload accepted by /api/validate, /api/schedule and /api/plan.
 */
export const GET = withRoute(async () => ok(EXAMPLE_PLAN));
