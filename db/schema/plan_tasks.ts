import {
  pgTable,
  text,
  integer,
  doublePrecision,
  boolean,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Plan tasks table schema.
 * One row per task in a saved plan; `position` keeps the caller's order,
 * which the scheduler uses as its final tie-break.
 */
export const planTasks = pgTable(
  'plan_tasks',
  {
    planId: text('plan_id').notNull(),
    taskId: integer('task_id').notNull(),
    position: integer('position').notNull(),
    name: text('name').notNull(),
    totalHours: doublePrecision('total_hours').notNull(),
    hoursPerSession: doublePrecision('hours_per_session').notNull(),
    priority: integer('priority').notNull(), // 1 = High, 2 = Medium, 3 = Low
    deadlineDay: integer('deadline_day').notNull(),
    hoursCompleted: doublePrecision('hours_completed').notNull().default(0),
    inProgress: boolean('in_progress').notNull().default(false),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.planId, table.taskId] }),
    planIdPositionIdx: index('plan_tasks_plan_id_position_idx').on(
      table.planId,
      table.position
    ),
  })
);

export type PlanTaskRow = typeof planTasks.$inferSelect;
export type NewPlanTaskRow = typeof planTasks.$inferInsert;
