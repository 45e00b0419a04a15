export * from './plan_tasks';
export * from './plan_closed_slots';
export * from './plan_settings';
export * from './schedule_runs';
