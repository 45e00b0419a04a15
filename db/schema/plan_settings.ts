import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
} from 'drizzle-orm/pg-core';

/**
 * Scheduler configuration of a saved plan, one row per plan.
 */
export const planSettings = pgTable('plan_settings', {
  planId: text('plan_id').primaryKey(),
  bufferMinutes: doublePrecision('buffer_minutes').notNull(),
  maxNewTaskStartsPerDay: integer('max_new_task_starts_per_day').notNull(),
  startDate: text('start_date').notNull(), // "now" or YYYY-MM-DD
  maxDays: integer('max_days'),
  savedAt: timestamp('saved_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export type PlanSettingsRow = typeof planSettings.$inferSelect;
export type NewPlanSettingsRow = typeof planSettings.$inferInsert;
