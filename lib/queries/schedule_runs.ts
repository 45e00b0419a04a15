import { getDb } from '@/lib/db';
import { scheduleRuns } from '@/db/schema/schedule_runs';
import { eq, desc } from 'drizzle-orm';
import { ok, err } from '@/lib/result';
import type { Result } from '@/lib/result';
import type { SavedScheduleRun } from '@/lib/types/plans';
import { scheduleOutcomeSchema } from '@/lib/validators/scheduler';

/**
 * Re-checks a stored outcome before it is handed back to callers.
 * Shared by the database and file stores.
 */
export function toSavedScheduleRun(
  planId: string,
  savedAt: string,
  outcome: unknown
): Result<SavedScheduleRun> {
  const parsed = scheduleOutcomeSchema.safeParse(outcome);
  if (!parsed.success) {
    return err('INTERNAL_ERROR', `Stored schedule '${planId}' is invalid`, parsed.error.issues);
  }
  return ok({ planId, savedAt, outcome: parsed.data });
}

/**
 * Gets the most recent schedule run of a plan.
 *
 * @param planId - Plan key
 * @returns Result containing the run, null when none exists, or an error
 */
export async function getLatestScheduleRun(
  planId: string
): Promise<Result<SavedScheduleRun | null>> {
  try {
    const [run] = await getDb()
      .select()
      .from(scheduleRuns)
      .where(eq(scheduleRuns.planId, planId))
      .orderBy(desc(scheduleRuns.createdAt))
      .limit(1);

    if (!run) return ok(null);

    return toSavedScheduleRun(run.planId, run.createdAt.toISOString(), run.outcome);
  } catch (error) {
    console.error('Error loading schedule run:', { planId, error });
    return err('INTERNAL_ERROR', 'Failed to load schedule', error instanceof Error ? error.message : error);
  }
}
