import {
  pgTable,
  uuid,
  text,
  integer,
  boolean,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import type { ScheduleOutcome } from '@/lib/scheduler/types';

/**
 * Generated schedules. `outcome` holds the full ScheduleOutcome; the scalar
 * columns copy its headline fields.
 */
export const scheduleRuns = pgTable(
  'schedule_runs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    planId: text('plan_id').notNull(),
    startDate: text('start_date').notNull(),
    horizonDays: integer('horizon_days').notNull(),
    totalDays: integer('total_days').notNull(),
    completed: boolean('completed').notNull(),
    outcome: jsonb('outcome').$type<ScheduleOutcome>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    planIdCreatedAtIdx: index('schedule_runs_plan_id_created_at_idx').on(
      table.planId,
      table.createdAt
    ),
  })
);

export type ScheduleRunRow = typeof scheduleRuns.$inferSelect;
export type NewScheduleRunRow = typeof scheduleRuns.$inferInsert;
