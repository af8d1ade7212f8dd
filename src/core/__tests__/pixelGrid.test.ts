import { BoundsError, ValidationError } from "../../errors";
import { RawPixelGrid } from "../pixelGrid";

describe("RawPixelGrid", () => {
  // 2 columns x 3 rows, RGB
  const makeGrid = () =>
    new RawPixelGrid(
      Uint8Array.from([
        1, 1, 1, 2, 2, 2,
        3, 3, 3, 4, 4, 4,
        5, 5, 5, 6, 6, 6,
      ]),
      2,
      3,
      3
    );

  it("checks the buffer against the shape", () => {
    expect(() => new RawPixelGrid(new Uint8Array(5), 2, 1, 3)).toThrow(ValidationError);
    expect(() => new RawPixelGrid(new Uint8Array(0), 0, 1, 3)).toThrow(ValidationError);
  });

  it("reads and writes single pixels", () => {
    const grid = makeGrid();
    expect(Array.from(grid.get(1, 1))).toEqual([4, 4, 4]);
    grid.set(1, 1, [9, 8, 7]);
    expect(Array.from(grid.get(1, 1))).toEqual([9, 8, 7]);
    expect(Array.from(grid.get(1, 0))).toEqual([3, 3, 3]);
  });

  it("returns copies from get", () => {
    const grid = makeGrid();
    grid.get(0, 0)[0] = 200;
    expect(grid.get(0, 0)[0]).toBe(1);
  });

  it("swaps a column range between two rows", () => {
    const grid = makeGrid();
    grid.swapRowSegment(0, 2, 1, 1);
    expect(Array.from(grid.data)).toEqual([
      1, 1, 1, 6, 6, 6,
      3, 3, 3, 4, 4, 4,
      5, 5, 5, 2, 2, 2,
    ]);
    grid.swapRowSegment(1, 2, 0, 1);
    expect(Array.from(grid.data)).toEqual([
      1, 1, 1, 6, 6, 6,
      5, 5, 5, 2, 2, 2,
      3, 3, 3, 4, 4, 4,
    ]);
  });

  it("exchanges rows of a Buffer-backed grid", () => {
    const source = Buffer.from([10, 20]);
    const grid = new RawPixelGrid(source, 1, 2, 1);
    grid.swapRowSegment(0, 1, 0, 0);
    expect(Array.from(grid.data)).toEqual([20, 10]);
    expect(Array.from(source)).toEqual([20, 10]);
  });

  it("copies out of a Buffer-backed grid on get and clone", () => {
    const grid = new RawPixelGrid(Buffer.from([1, 2, 3, 4, 5, 6]), 2, 1, 3);
    grid.get(0, 1)[0] = 99;
    const copy = grid.clone();
    copy.set(0, 0, [0, 0, 0]);
    expect(Array.from(grid.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("treats a swap with itself as a no-op", () => {
    const grid = makeGrid();
    grid.swapRowSegment(1, 1, 0, 1);
    expect(Array.from(grid.data)).toEqual(Array.from(makeGrid().data));
  });

  it("rejects coordinates outside the grid", () => {
    const grid = makeGrid();
    expect(() => grid.get(3, 0)).toThrow(BoundsError);
    expect(() => grid.get(0, -1)).toThrow(BoundsError);
    expect(() => grid.swapRowSegment(0, 3, 0, 1)).toThrow(BoundsError);
    expect(() => grid.swapRowSegment(0, 1, 1, 0)).toThrow(BoundsError);
    expect(() => grid.set(0, 0, [1, 2])).toThrow(ValidationError);
  });

  it("clones into independent storage", () => {
    const grid = makeGrid();
    const copy = grid.clone();
    copy.set(0, 0, [0, 0, 0]);
    expect(Array.from(grid.get(0, 0))).toEqual([1, 1, 1]);
    expect(copy.cols).toBe(2);
    expect(copy.rows).toBe(3);
  });

  it("starts blank grids at zero", () => {
    const grid = RawPixelGrid.blank(4, 2, 1);
    expect(grid.data.length).toBe(8);
    expect(grid.data.every((b) => b === 0)).toBe(true);
  });
});
