import { formatHours } from './format';
import { PRIORITY_LABELS, type DaySchedule, type ScheduleOutcome } from './types';

const RULE = '='.repeat(80);
const DAY_RULE = '-'.repeat(80);

function dayLines(day: DaySchedule): string[] {
  const lines = [`DAY ${day.dayNumber} - ${day.dateLabel}`, DAY_RULE];

  for (const warning of day.warnings) {
    lines.push(`   ! ${warning}`);
  }

  if (day.sessions.length === 0) {
    lines.push('   (No tasks scheduled)', '');
  }

  for (const session of day.sessions) {
    lines.push(
      `   ${session.startTime} - ${session.endTime} (${formatHours(session.durationHours)})`,
      `   ${session.taskName}`,
      `   ${PRIORITY_LABELS[session.priority]} priority | Progress: ${session.progress}`,
      ''
    );
  }

  return lines;
}

function warningSection(title: string, warnings: readonly string[]): string[] {
  if (warnings.length === 0) return [];
  return [title, ...warnings.map(warning => `   - ${warning}`), ''];
}

/**
 * Plain-text rendering of a schedule, one array entry per line.
 *
 * @param validationWarnings - Output of `validate`, printed above the days.
 *   Run warnings repeating one of these are not printed a second time.
 */
export function formatScheduleReport(
  outcome: ScheduleOutcome,
  validationWarnings: readonly string[] = []
): string[] {
  const lines = [RULE, 'GENERATED SCHEDULE', RULE, ''];

  lines.push(...warningSection('VALIDATION WARNINGS:', validationWarnings));

  for (const day of outcome.days) {
    lines.push(...dayLines(day), '');
  }

  const alreadyShown = new Set(validationWarnings);
  lines.push(
    ...warningSection(
      'SCHEDULE WARNINGS:',
      outcome.warnings.filter(warning => !alreadyShown.has(warning))
    )
  );

  const unfinished = outcome.tasks.filter(task => !task.completed);
  lines.push(RULE);
  lines.push(
    unfinished.length === 0
      ? `Schedule generated with ${outcome.days.length} days`
      : `Schedule generated with ${outcome.days.length} days; ${unfinished.length} task(s) unfinished`
  );
  lines.push(RULE);

  return lines;
}
