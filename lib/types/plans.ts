import type { ScheduleOutcome } from '@/lib/scheduler/types';
import type { PlanPayload } from '@/lib/validators/scheduler';

/**
 * A plan as persisted: the transport payload, stored verbatim.
 */
export interface SavedPlan {
  planId: string;
  /** ISO timestamp of the save */
  savedAt: string;
  plan: PlanPayload;
}

/**
 * The most recent schedule generated for a plan.
 */
export interface SavedScheduleRun {
  planId: string;
  /** ISO timestamp of the run */
  savedAt: string;
  outcome: ScheduleOutcome;
}
