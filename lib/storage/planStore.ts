import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { getDatabaseUrl, getStorageDir } from '@/config/scheduler';
import { getPlan } from '@/lib/queries/plans';
import { getLatestScheduleRun, toSavedScheduleRun } from '@/lib/queries/schedule_runs';
import { savePlan } from '@/lib/mutations/plans';
import { recordScheduleRun } from '@/lib/mutations/schedule_runs';
import { err, ok, type Result } from '@/lib/result';
import type { ScheduleOutcome } from '@/lib/scheduler/types';
import type { SavedPlan, SavedScheduleRun } from '@/lib/types/plans';
import { planSchema, type PlanPayload } from '@/lib/validators/scheduler';

/**
 * Persistence for plans and their generated schedules.
 * Plans are stored verbatim, as parsed from the transport payload.
 */
export interface PlanStore {
  readonly kind: 'database' | 'file';
  loadPlan(planId: string): Promise<Result<SavedPlan | null>>;
  savePlan(planId: string, plan: PlanPayload): Promise<Result<SavedPlan>>;
  loadLatestRun(planId: string): Promise<Result<SavedScheduleRun | null>>;
  saveRun(planId: string, outcome: ScheduleOutcome): Promise<Result<SavedScheduleRun>>;
}

export function createDatabasePlanStore(): PlanStore {
  return {
    kind: 'database',
    loadPlan: getPlan,
    savePlan,
    loadLatestRun: getLatestScheduleRun,
    saveRun: recordScheduleRun,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJson(filePath: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

/**
 * Writes to a temp file, then renames it over the target.
 */
async function writeJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
  await rename(tmpPath, filePath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * File-backed store: `<planId>.plan.json` and `<planId>.schedule.json` under `dir`.
 */
export function createFilePlanStore(dir: string = getStorageDir()): PlanStore {
  const planFile = (planId: string) => path.join(dir, `${planId}.plan.json`);
  const runFile = (planId: string) => path.join(dir, `${planId}.schedule.json`);

  return {
    kind: 'file',

    async loadPlan(planId) {
      try {
        const stored = await readJson(planFile(planId));
        if (stored === null) return ok(null);
        if (!isRecord(stored) || typeof stored.savedAt !== 'string') {
          return err('INTERNAL_ERROR', `Stored plan '${planId}' is invalid`);
        }
        const parsed = planSchema.safeParse(stored.plan);
        if (!parsed.success) {
          return err('INTERNAL_ERROR', `Stored plan '${planId}' is invalid`, parsed.error.issues);
        }
        return ok({ planId, savedAt: stored.savedAt, plan: parsed.data });
      } catch (error) {
        console.error('Error reading plan file:', { planId, dir, error });
        return err('INTERNAL_ERROR', 'Failed to load plan', error instanceof Error ? error.message : error);
      }
    },

    async savePlan(planId, plan) {
      const saved: SavedPlan = { planId, savedAt: new Date().toISOString(), plan };
      try {
        await writeJson(planFile(planId), saved);
        return ok(saved);
      } catch (error) {
        console.error('Error writing plan file:', { planId, dir, error });
        return err('INTERNAL_ERROR', 'Failed to save plan', error instanceof Error ? error.message : error);
      }
    },

    async loadLatestRun(planId) {
      try {
        const stored = await readJson(runFile(planId));
        if (stored === null) return ok(null);
        if (!isRecord(stored) || typeof stored.savedAt !== 'string') {
          return err('INTERNAL_ERROR', `Stored schedule '${planId}' is invalid`);
        }
        return toSavedScheduleRun(planId, stored.savedAt, stored.outcome);
      } catch (error) {
        console.error('Error reading schedule file:', { planId, dir, error });
        return err('INTERNAL_ERROR', 'Failed to load schedule', error instanceof Error ? error.message : error);
      }
    },

    async saveRun(planId, outcome) {
      const saved: SavedScheduleRun = { planId, savedAt: new Date().toISOString(), outcome };
      try {
        await writeJson(runFile(planId), saved);
        return ok(saved);
      } catch (error) {
        console.error('Error writing schedule file:', { planId, dir, error });
        return err('INTERNAL_ERROR', 'Failed to save schedule', error instanceof Error ? error.message : error);
      }
    },
  };
}

/**
 * Store selected from the environment: Postgres when DATABASE_URL is set,
 * otherwise JSON files under SCHEDULER_STORAGE_DIR.
 */
export function getPlanStore(): PlanStore {
  return getDatabaseUrl() ? createDatabasePlanStore() : createFilePlanStore();
}
