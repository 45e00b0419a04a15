import test from 'node:test';
import assert from 'node:assert/strict';
import { checkConfiguration, defaultHorizonDays } from '@/lib/scheduler/configuration';
import { schedule } from '@/lib/scheduler';
import type { Result } from '@/lib/result';
import type { ClosedTimeSlot, SchedulerConfig, Task } from '@/lib/scheduler/types';

const options = { now: new Date('2024-02-15T12:00:00Z'), timeZone: 'UTC' };

const baseConfig: SchedulerConfig = {
  bufferMinutes: 15,
  maxNewTaskStartsPerDay: 2,
  startDate: '2024-02-15',
};

const essay: Task = {
  id: 1,
  name: 'Essay',
  totalHours: 4,
  hoursPerSession: 2,
  priority: 1,
  deadlineDay: 7,
  hoursCompleted: 0,
  inProgress: false,
};

function issuesOf<T>(result: Result<T>): string[] {
  assert.equal(result.ok, false);
  if (result.ok) return [];
  assert.equal(result.error.code, 'CONFIGURATION_ERROR');
  const details = result.error.details;
  assert.ok(typeof details === 'object' && details !== null && 'issues' in details);
  const { issues } = details;
  assert.ok(Array.isArray(issues));
  return issues.map(String);
}

test('a valid configuration resolves the start date and horizon', () => {
  const result = checkConfiguration([essay], [], baseConfig, options);
  assert.deepEqual(result, { ok: true, data: { startDate: '2024-02-15', horizonDays: 17 } });
});

test('an explicit maxDays replaces the derived horizon', () => {
  const result = checkConfiguration([essay], [], { ...baseConfig, maxDays: 5 }, options);
  assert.deepEqual(result, { ok: true, data: { startDate: '2024-02-15', horizonDays: 5 } });
});

test('the derived horizon pads the latest deadline', () => {
  assert.equal(defaultHorizonDays([essay, { ...essay, id: 2, deadlineDay: 12 }]), 22);
  assert.equal(defaultHorizonDays([]), 10);
});

test('inverted closed slots are rejected', () => {
  const slot: ClosedTimeSlot = { startMinutes: 600, endMinutes: 540, scope: { kind: 'all_days' } };
  assert.deepEqual(issuesOf(checkConfiguration([essay], [slot], baseConfig, options)), [
    'closed slot #1 is empty or inverted (10:00-09:00); start must be before end on the same day',
  ]);
});

test('the error message lists every issue', () => {
  const slot: ClosedTimeSlot = { startMinutes: 600, endMinutes: 600, scope: { kind: 'all_days' }, label: 'Gym' };
  const result = checkConfiguration([essay], [slot], { ...baseConfig, bufferMinutes: -5 }, options);

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(
    result.error.message,
    'Invalid scheduler configuration: closed slot #1 (Gym) is empty or inverted (10:00-10:00); ' +
      'start must be before end on the same day; bufferMinutes must be 0 or more'
  );
});

test('slots outside the day are rejected', () => {
  const slot: ClosedTimeSlot = { startMinutes: 1380, endMinutes: 1500, scope: { kind: 'all_days' } };
  assert.deepEqual(issuesOf(checkConfiguration([essay], [slot], baseConfig, options)), [
    'closed slot #1 must lie within 00:00-24:00',
  ]);
});

test('weekday scopes need weekdays from 0 to 6', () => {
  const empty: ClosedTimeSlot = { startMinutes: 0, endMinutes: 60, scope: { kind: 'weekdays', weekdays: [] } };
  const outOfRange: ClosedTimeSlot = {
    startMinutes: 0,
    endMinutes: 60,
    scope: { kind: 'weekdays', weekdays: [2, 7] },
  };

  assert.deepEqual(issuesOf(checkConfiguration([essay], [empty, outOfRange], baseConfig, options)), [
    'closed slot #1 applies to weekdays but lists none',
    'closed slot #2 has weekday 7; weekdays run 0 (Monday) to 6 (Sunday)',
  ]);
});

test('specific-date scopes need a real date', () => {
  const slot: ClosedTimeSlot = {
    startMinutes: 0,
    endMinutes: 60,
    scope: { kind: 'specific_date', date: '2024-13-01' },
  };
  assert.deepEqual(issuesOf(checkConfiguration([essay], [slot], baseConfig, options)), [
    "closed slot #1 has invalid date '2024-13-01'; use YYYY-MM-DD",
  ]);
});

test('task hours, deadlines and ids are checked', () => {
  const tasks: Task[] = [
    { ...essay, totalHours: 0, hoursCompleted: 0 },
    { ...essay, name: 'Report', hoursPerSession: -1 },
    { ...essay, id: 2, name: 'Budget', hoursCompleted: 5 },
    { ...essay, id: 3, name: 'Slides', deadlineDay: -1 },
  ];

  assert.deepEqual(issuesOf(checkConfiguration(tasks, [], baseConfig, options)), [
    "task 'Essay' must have totalHours greater than 0",
    "task 'Report' must have hoursPerSession greater than 0",
    'task id 1 is used more than once',
    "task 'Budget' must have hoursCompleted between 0 and totalHours",
    "task 'Slides' must have a whole, non-negative deadlineDay",
  ]);
});

test('run limits and the start date are checked', () => {
  const config: SchedulerConfig = {
    bufferMinutes: 15,
    maxNewTaskStartsPerDay: 1.5,
    startDate: 'tomorrow',
    maxDays: 0,
  };

  assert.deepEqual(issuesOf(checkConfiguration([essay], [], config, options)), [
    'maxNewTaskStartsPerDay must be a whole number of 0 or more',
    'maxDays must be a whole number from 1 to 3660',
    `startDate 'tomorrow' cannot be resolved; use "now" or YYYY-MM-DD`,
  ]);
});

test('schedule rejects a bad configuration before placing anything', () => {
  const result = schedule([essay], [], { ...baseConfig, maxNewTaskStartsPerDay: -1 }, options);
  assert.deepEqual(issuesOf(result), ['maxNewTaskStartsPerDay must be a whole number of 0 or more']);
});
