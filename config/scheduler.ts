/**
 * Scheduler configuration
 *
 * Defaults for the planner and lazy environment getters.
 * Nothing here reads process.env at import time.
 */

export const SCHEDULER_DEFAULTS = {
  /** Minutes kept free after each session inside the same block */
  BUFFER_MINUTES: 15,

  /** Tasks that may begin their first session on a single day */
  MAX_NEW_TASK_STARTS_PER_DAY: 2,

  /** Days evaluated past the latest deadline when no horizon is given */
  HORIZON_PADDING_DAYS: 10,

  /** Upper bound for an explicit or derived horizon */
  MAX_HORIZON_DAYS: 3660,

  /** Plan key used when a request does not name one */
  PLAN_ID: 'default',

  /** Directory for the file-backed plan store */
  STORAGE_DIR: './scheduler_storage',
} as const;

/**
 * Directory used by the file-backed plan store.
 */
export function getStorageDir(): string {
  return process.env.SCHEDULER_STORAGE_DIR?.trim() || SCHEDULER_DEFAULTS.STORAGE_DIR;
}

/**
 * Time zone used to turn `startDate: "now"` into a calendar day.
 * Falls back to the host zone, then UTC.
 */
export function getSchedulerTimeZone(): string {
  return (
    process.env.SCHEDULER_TIMEZONE?.trim() ||
    Intl.DateTimeFormat().resolvedOptions().timeZone ||
    'UTC'
  );
}

/**
 * Postgres connection string. Null selects the file-backed store.
 */
export function getDatabaseUrl(): string | null {
  return process.env.DATABASE_URL?.trim() || null;
}
