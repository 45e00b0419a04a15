/**
 * lib/scheduler/placement.ts
 *
 * Places one session into a day's free blocks.
 *
 * Rules:
 * - Earliest fit: the first block (in start order) with enough room wins,
 *   never the largest
 * - A session is never split across blocks
 * - The buffer is taken from the same block; a block left with no room is dropped
 */

import { intervalMinutes, sortIntervals } from './intervals';
import type { AvailableBlock, TimeInterval } from './types';

export type PlacementResult = {
  placement: TimeInterval | null;
  /** Free blocks left after the placement (unchanged when placement is null) */
  blocks: AvailableBlock[];
};

/**
 * @param durationMinutes - Length of the session to place
 * @param blocks - The day's remaining free blocks
 * @param bufferMinutes - Minutes consumed after the session before the block may be reused
 */
export function placeSession({
  durationMinutes,
  blocks,
  bufferMinutes,
}: {
  durationMinutes: number;
  blocks: readonly AvailableBlock[];
  bufferMinutes: number;
}): PlacementResult {
  const sorted = sortIntervals(blocks);
  const index = sorted.findIndex(block => intervalMinutes(block) >= durationMinutes);

  if (index === -1) {
    return { placement: null, blocks: sorted };
  }

  const block = sorted[index];
  const placement: TimeInterval = {
    startMinutes: block.startMinutes,
    endMinutes: block.startMinutes + durationMinutes,
  };

  const shrunk: AvailableBlock = {
    ...block,
    startMinutes: Math.min(block.endMinutes, placement.endMinutes + bufferMinutes),
  };

  const remaining = [...sorted];
  if (intervalMinutes(shrunk) > 0) {
    remaining[index] = shrunk;
  } else {
    remaining.splice(index, 1);
  }

  return { placement, blocks: remaining };
}
