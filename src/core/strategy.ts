import { assertBoxWithinGrid, type BoundingBox } from "./boundingBox";
import type { KeyVector } from "./key";
import { scramble, unscramble, type RowPair } from "./permutation";
import type { PixelGrid } from "./pixelGrid";

export type ShuffleStrategy =
  | { kind: "key-based"; key: KeyVector }
  | { kind: "none" };

export type ShuffleDirection = "scramble" | "unscramble";

export function keyBased(key: KeyVector): ShuffleStrategy {
  return { kind: "key-based", key };
}

export const noShuffle: ShuffleStrategy = { kind: "none" };

/**
 * Run a strategy over the region of `grid`. The "none" strategy leaves the
 * pixels alone but still checks the region.
 */
export function applyStrategy(
  strategy: ShuffleStrategy,
  direction: ShuffleDirection,
  grid: PixelGrid,
  box: BoundingBox
): RowPair[] {
  switch (strategy.kind) {
    case "key-based":
      return direction === "scramble"
        ? scramble(grid, box, strategy.key)
        : unscramble(grid, box, strategy.key);
    case "none":
      assertBoxWithinGrid(box, grid);
      return [];
  }
}
