import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { schedule, validate } from '@/lib/scheduler';
import { EXAMPLE_PLAN } from '@/lib/scheduler/example';
import { toSchedulerInput } from '@/lib/scheduler/payload';
import { formatScheduleReport } from '@/lib/scheduler/report';
import { planSchema } from '@/lib/validators/scheduler';

/**
 * Usage: tsx scripts/print-schedule.ts [payload.json]
 * Without a file the built-in example plan is used.
 */
async function loadPayload(file: string | undefined): Promise<unknown> {
  if (!file) return EXAMPLE_PLAN;
  return JSON.parse(await readFile(resolve(process.cwd(), file), 'utf8'));
}

async function main(): Promise<void> {
  const file = process.argv[2];
  const parsed = planSchema.safeParse(await loadPayload(file));
  if (!parsed.success) {
    console.error('Invalid plan payload:', parsed.error.issues);
    process.exitCode = 1;
    return;
  }

  const { tasks, closedSlots, config } = toSchedulerInput(parsed.data);

  const warnings = validate(tasks, closedSlots, config);
  if (!warnings.ok) {
    console.error(warnings.error.message, warnings.error.details);
    process.exitCode = 1;
    return;
  }

  const outcome = schedule(tasks, closedSlots, config);
  if (!outcome.ok) {
    console.error(outcome.error.message, outcome.error.details);
    process.exitCode = 1;
    return;
  }

  console.log(formatScheduleReport(outcome.data, warnings.data).join('\n'));
}

main().catch((error) => {
  console.error('Printing schedule failed:', error);
  process.exitCode = 1;
});
