import {
  pgTable,
  uuid,
  text,
  integer,
  date,
  pgEnum,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Which days a closed slot applies to.
 */
export const closedSlotScopeEnum = pgEnum('closed_slot_scope', [
  'all_days',
  'weekdays',
  'specific_date',
]);

/**
 * Closed (unavailable) time slots of a saved plan.
 * `weekdays` is set only for the weekdays scope (0 = Monday),
 * `specific_date` only for the specific_date scope.
 */
export const planClosedSlots = pgTable(
  'plan_closed_slots',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    planId: text('plan_id').notNull(),
    position: integer('position').notNull(),
    startHour: integer('start_hour').notNull(),
    startMinute: integer('start_minute').notNull().default(0),
    endHour: integer('end_hour').notNull(),
    endMinute: integer('end_minute').notNull().default(0),
    appliesTo: closedSlotScopeEnum('applies_to').notNull(),
    weekdays: integer('weekdays').array(),
    specificDate: date('specific_date', { mode: 'string' }),
    label: text('label'),
  },
  (table) => ({
    planIdPositionIdx: index('plan_closed_slots_plan_id_position_idx').on(
      table.planId,
      table.position
    ),
  })
);

export type PlanClosedSlotRow = typeof planClosedSlots.$inferSelect;
export type NewPlanClosedSlotRow = typeof planClosedSlots.$inferInsert;
