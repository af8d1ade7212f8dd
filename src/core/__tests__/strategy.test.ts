import { BoundsError } from "../../errors";
import { createBoundingBox } from "../boundingBox";
import { KeyVector } from "../key";
import { RawPixelGrid } from "../pixelGrid";
import { applyStrategy, keyBased, noShuffle } from "../strategy";

describe("applyStrategy", () => {
  const box = createBoundingBox(2, 5, 0, 0);
  const makeGrid = () => new RawPixelGrid(Uint8Array.from([0, 10, 20, 30, 40, 50]), 1, 6, 1);

  it("scrambles and unscrambles with a key", () => {
    const grid = makeGrid();
    const strategy = keyBased(new KeyVector([1, 2, 3]));

    const forward = applyStrategy(strategy, "scramble", grid, box);
    expect(forward).toHaveLength(4);
    expect(Array.from(grid.data)).toEqual([0, 10, 20, 40, 50, 30]);

    applyStrategy(strategy, "unscramble", grid, box);
    expect(Array.from(grid.data)).toEqual([0, 10, 20, 30, 40, 50]);
  });

  it("leaves pixels alone with no shuffle", () => {
    const grid = makeGrid();
    expect(applyStrategy(noShuffle, "scramble", grid, box)).toEqual([]);
    expect(Array.from(grid.data)).toEqual([0, 10, 20, 30, 40, 50]);
  });

  it("checks the region even with no shuffle", () => {
    expect(() => applyStrategy(noShuffle, "unscramble", makeGrid(), createBoundingBox(0, 6, 0, 0))).toThrow(
      BoundsError
    );
  });
});
