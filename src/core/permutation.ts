/**
 * Key-based row permutation.
 *
 * Each row of the region is swapped, in order, with a partner row taken from
 * the working key. The swaps form a sequential chain: later swaps see the
 * result of earlier ones and partners may repeat, so the chain has no
 * closed-form inverse. Unscrambling replays the identical pairs in reverse.
 *
 * The engine keeps no record of earlier calls. Unscrambling with a key or
 * region other than the ones used to scramble does not fail; it produces a
 * different, generally unrecoverable image. Pairing the right key and
 * region is the caller's job.
 */

import { assertBoxWithinGrid, type BoundingBox } from "./boundingBox";
import type { KeyVector } from "./key";
import type { PixelGrid } from "./pixelGrid";

export interface RowPair {
  row: number;
  partner: number;
}

/**
 * Working key: the user key shifted into the region's rows and stretched to
 * one term per row.
 */
export function deriveWorkingKey(box: BoundingBox, key: KeyVector): KeyVector {
  const rowSpan = box.maxRow - box.minRow + 1;
  return key.shiftToRange(box.minRow, box.maxRow).extend(rowSpan);
}

/** Row-pairing sequence in scramble order. */
export function derivePairs(box: BoundingBox, key: KeyVector): RowPair[] {
  const working = deriveWorkingKey(box, key);
  const rowSpan = box.maxRow - box.minRow + 1;
  const pairs: RowPair[] = [];
  for (let k = 0; k < rowSpan; k++) {
    pairs.push({ row: box.minRow + k, partner: working.at(k) });
  }
  return pairs;
}

function applyPairs(grid: PixelGrid, box: BoundingBox, pairs: readonly RowPair[]): void {
  for (const { row, partner } of pairs) {
    grid.swapRowSegment(row, partner, box.minCol, box.maxCol);
  }
}

/**
 * Scramble the region in place.
 *
 * @throws BoundsError when the region does not fit the grid; nothing is
 * mutated in that case
 */
export function scramble(grid: PixelGrid, box: BoundingBox, key: KeyVector): RowPair[] {
  assertBoxWithinGrid(box, grid);
  const pairs = derivePairs(box, key);
  applyPairs(grid, box, pairs);
  return pairs;
}

/**
 * Undo `scramble` for the same key and region, in place.
 *
 * @throws BoundsError when the region does not fit the grid
 */
export function unscramble(grid: PixelGrid, box: BoundingBox, key: KeyVector): RowPair[] {
  assertBoxWithinGrid(box, grid);
  const pairs = derivePairs(box, key).reverse();
  applyPairs(grid, box, pairs);
  return pairs;
}
