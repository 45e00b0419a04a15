import { withRoute } from '@/lib/api/withRoute';
import { ok } from '@/lib/result';
import { getPlanStore } from '@/lib/storage/planStore';

/**
 * GET /api/health
 */
export const GET = withRoute(async () => {
  return ok({
    status: 'healthy',
    message: 'Session planner API is running',
    storage: getPlanStore().kind,
  });
});
