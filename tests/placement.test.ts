import test from 'node:test';
import assert from 'node:assert/strict';
import { placeSession } from '@/lib/scheduler/placement';
import type { AvailableBlock } from '@/lib/scheduler/types';

const block = (startMinutes: number, endMinutes: number): AvailableBlock => ({
  date: '2024-02-15',
  startMinutes,
  endMinutes,
});

test('the session starts at the first block with room and the buffer follows it', () => {
  const result = placeSession({
    durationMinutes: 180,
    blocks: [block(480, 720), block(780, 1200)],
    bufferMinutes: 15,
  });

  assert.deepEqual(result.placement, { startMinutes: 480, endMinutes: 660 });
  assert.deepEqual(result.blocks, [block(675, 720), block(780, 1200)]);
});

test('earliest fit is chosen over the largest block', () => {
  const result = placeSession({
    durationMinutes: 300,
    blocks: [block(480, 720), block(780, 1080), block(1100, 1440)],
    bufferMinutes: 15,
  });

  assert.deepEqual(result.placement, { startMinutes: 780, endMinutes: 1080 });
  assert.deepEqual(result.blocks, [block(480, 720), block(1100, 1440)]);
});

test('a block consumed by session and buffer is dropped', () => {
  const result = placeSession({
    durationMinutes: 180,
    blocks: [block(480, 670), block(800, 900)],
    bufferMinutes: 15,
  });

  assert.deepEqual(result.placement, { startMinutes: 480, endMinutes: 660 });
  assert.deepEqual(result.blocks, [block(800, 900)]);
});

test('without a buffer the remainder of the block stays usable', () => {
  const result = placeSession({
    durationMinutes: 60,
    blocks: [block(480, 600)],
    bufferMinutes: 0,
  });

  assert.deepEqual(result.placement, { startMinutes: 480, endMinutes: 540 });
  assert.deepEqual(result.blocks, [block(540, 600)]);
});

test('nothing is placed when no block is long enough', () => {
  const blocks = [block(480, 720), block(780, 1000)];
  const result = placeSession({ durationMinutes: 300, blocks, bufferMinutes: 15 });

  assert.equal(result.placement, null);
  assert.deepEqual(result.blocks, blocks);
});

test('blocks are considered in start order and the input is not modified', () => {
  const blocks = [block(900, 1200), block(480, 600)];
  const result = placeSession({ durationMinutes: 60, blocks, bufferMinutes: 15 });

  assert.deepEqual(result.placement, { startMinutes: 480, endMinutes: 540 });
  assert.deepEqual(result.blocks, [block(555, 600), block(900, 1200)]);
  assert.deepEqual(blocks, [block(900, 1200), block(480, 600)]);
});
