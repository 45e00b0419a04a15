import { getDb } from '@/lib/db';
import { scheduleRuns } from '@/db/schema/schedule_runs';
import { ok, err } from '@/lib/result';
import type { Result } from '@/lib/result';
import type { ScheduleOutcome } from '@/lib/scheduler/types';
import type { SavedScheduleRun } from '@/lib/types/plans';

/**
 * Records a generated schedule.
 *
 * @param planId - Plan key the run belongs to
 * @param outcome - The scheduler's output, stored as JSON
 * @returns Result containing the stored run or an error
 */
export async function recordScheduleRun(
  planId: string,
  outcome: ScheduleOutcome
): Promise<Result<SavedScheduleRun>> {
  try {
    const [run] = await getDb()
      .insert(scheduleRuns)
      .values({
        planId,
        startDate: outcome.startDate,
        horizonDays: outcome.horizonDays,
        totalDays: outcome.days.length,
        completed: outcome.completed,
        outcome,
      })
      .returning({ createdAt: scheduleRuns.createdAt });

    if (!run) {
      return err('INTERNAL_ERROR', 'Failed to record schedule');
    }

    return ok({ planId, savedAt: run.createdAt.toISOString(), outcome });
  } catch (error) {
    console.error('Error recording schedule run:', { planId, error });
    return err('INTERNAL_ERROR', 'Failed to record schedule', error instanceof Error ? error.message : error);
  }
}
