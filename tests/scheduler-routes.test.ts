import test, { after, before } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { GET as healthGet } from '@/app/api/health/route';
import { GET as exampleGet } from '@/app/api/example/route';
import { POST as validatePost } from '@/app/api/validate/route';
import { GET as scheduleGet, POST as schedulePost } from '@/app/api/schedule/route';
import { GET as planGet, POST as planPost } from '@/app/api/plan/route';
import { EXAMPLE_PLAN } from '@/lib/scheduler/example';
import { planSchema } from '@/lib/validators/scheduler';

const plan = { ...EXAMPLE_PLAN, config: { ...EXAMPLE_PLAN.config, startDate: '2024-02-15' } };

let storageDir = '';
let previousDatabaseUrl: string | undefined;
let previousStorageDir: string | undefined;

before(async () => {
  previousDatabaseUrl = process.env.DATABASE_URL;
  previousStorageDir = process.env.SCHEDULER_STORAGE_DIR;
  storageDir = await mkdtemp(path.join(tmpdir(), 'planner-routes-'));
  delete process.env.DATABASE_URL;
  process.env.SCHEDULER_STORAGE_DIR = storageDir;
});

after(async () => {
  if (previousDatabaseUrl !== undefined) process.env.DATABASE_URL = previousDatabaseUrl;
  if (previousStorageDir === undefined) {
    delete process.env.SCHEDULER_STORAGE_DIR;
  } else {
    process.env.SCHEDULER_STORAGE_DIR = previousStorageDir;
  }
  await rm(storageDir, { recursive: true, force: true });
});

function postJson(url: string, body: unknown): Request {
  return new Request(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
}

test('health reports the active store', async () => {
  const res = await healthGet(new Request('http://localhost/api/health'));
  const payload = await res.json();
  assert.equal(res.status, 200);
  assert.equal(payload.ok, true);
  assert.equal(payload.data.status, 'healthy');
  assert.equal(payload.data.storage, 'file');
});

test('example returns a plan the schema accepts', async () => {
  const res = await exampleGet(new Request('http://localhost/api/example'));
  const payload = await res.json();
  assert.equal(payload.ok, true);
  assert.equal(planSchema.safeParse(payload.data).success, true);
  assert.equal(payload.data.tasks.length, 2);
});

test('validate returns warnings and isValid', async () => {
  const res = await validatePost(postJson('http://localhost/api/validate', plan));
  const payload = await res.json();
  assert.equal(res.status, 200);
  assert.deepEqual(payload, { ok: true, data: { warnings: [], isValid: true } });
});

test('validate rejects a body that is not JSON', async () => {
  const res = await validatePost(
    new Request('http://localhost/api/validate', { method: 'POST', body: '{not json' })
  );
  const payload = await res.json();
  assert.equal(res.status, 400);
  assert.equal(payload.error.code, 'VALIDATION_ERROR');
  assert.equal(payload.error.message, 'Request body must be valid JSON');
});

test('validate rejects a payload of the wrong shape', async () => {
  const res = await validatePost(postJson('http://localhost/api/validate', { tasks: 'none' }));
  const payload = await res.json();
  assert.equal(res.status, 400);
  assert.equal(payload.error.code, 'VALIDATION_ERROR');
  assert.ok(Array.isArray(payload.error.details.issues));
});

test('validate reports configuration errors with status 400', async () => {
  const inverted = {
    ...plan,
    closedSlots: [{ startHour: 10, endHour: 9, appliesTo: 'all_days' }],
  };
  const res = await validatePost(postJson('http://localhost/api/validate', inverted));
  const payload = await res.json();
  assert.equal(res.status, 400);
  assert.equal(payload.error.code, 'CONFIGURATION_ERROR');
  assert.deepEqual(payload.error.details.issues, [
    'closed slot #1 is empty or inverted (10:00-09:00); start must be before end on the same day',
  ]);
});

test('schedule generates, stores and reloads the latest run', async () => {
  const postRes = await schedulePost(postJson('http://localhost/api/schedule?planId=routes', plan));
  const posted = await postRes.json();
  assert.equal(postRes.status, 200);
  assert.equal(posted.ok, true);
  assert.equal(posted.data.planId, 'routes');
  assert.equal(posted.data.startDate, '2024-02-15');
  assert.equal(posted.data.completed, true);
  assert.equal(posted.data.totalDays, posted.data.days.length);

  const getRes = await scheduleGet(new Request('http://localhost/api/schedule?planId=routes'));
  const loaded = await getRes.json();
  assert.equal(getRes.status, 200);
  assert.deepEqual(loaded.data.days, posted.data.days);
  assert.deepEqual(loaded.data.warnings, posted.data.warnings);
  assert.equal(loaded.data.savedAt, posted.data.savedAt);
});

test('schedule needs at least one task', async () => {
  const res = await schedulePost(postJson('http://localhost/api/schedule', { ...plan, tasks: [] }));
  const payload = await res.json();
  assert.equal(res.status, 400);
  assert.equal(payload.error.message, 'At least one task is required');
});

test('an unknown plan has no stored schedule', async () => {
  const res = await scheduleGet(new Request('http://localhost/api/schedule?planId=unknown'));
  const payload = await res.json();
  assert.equal(res.status, 404);
  assert.equal(payload.error.code, 'NOT_FOUND');
});

test('plan ids are restricted to safe characters', async () => {
  const res = await planGet(new Request('http://localhost/api/plan?planId=..%2Fescape'));
  const payload = await res.json();
  assert.equal(res.status, 400);
  assert.equal(payload.error.code, 'VALIDATION_ERROR');
});

test('plans round-trip through save and load', async () => {
  const saveRes = await planPost(postJson('http://localhost/api/plan?planId=week-7', plan));
  const saved = await saveRes.json();
  assert.equal(saveRes.status, 200);
  assert.equal(saved.data.planId, 'week-7');

  const loadRes = await planGet(new Request('http://localhost/api/plan?planId=week-7'));
  const loaded = await loadRes.json();
  assert.equal(loadRes.status, 200);
  assert.deepEqual(loaded.data.plan, planSchema.parse(plan));
  assert.equal(loaded.data.savedAt, saved.data.savedAt);
});
