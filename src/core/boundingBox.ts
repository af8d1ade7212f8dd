import { BoundsError, UndefinedRegionError } from "../errors";
import type { PixelGrid } from "./pixelGrid";

export interface LandmarkPoint {
  x: number;
  y: number;
}

/** 1-based landmark id → image coordinate. */
export type LandmarkMap = ReadonlyMap<number, LandmarkPoint>;

/** Inclusive pixel region; rows are y, columns are x. */
export interface BoundingBox {
  readonly minRow: number;
  readonly maxRow: number;
  readonly minCol: number;
  readonly maxCol: number;
}

export function createBoundingBox(minRow: number, maxRow: number, minCol: number, maxCol: number): BoundingBox {
  const edges = { minRow, maxRow, minCol, maxCol };
  for (const [name, value] of Object.entries(edges)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new BoundsError(`${name} must be a non-negative integer, got ${value}`);
    }
  }
  if (minRow > maxRow) {
    throw new BoundsError(`minRow ${minRow} is greater than maxRow ${maxRow}`);
  }
  if (minCol > maxCol) {
    throw new BoundsError(`minCol ${minCol} is greater than maxCol ${maxCol}`);
  }
  return Object.freeze(edges);
}

/**
 * Tightest box around every landmark. An empty map has no box; callers must
 * not fall back to the whole image.
 */
export function boundingBoxFromLandmarks(landmarks: LandmarkMap): BoundingBox | undefined {
  if (landmarks.size === 0) return undefined;

  const points = [...landmarks.values()];
  const ys = points.map((p) => p.y);
  const xs = points.map((p) => p.x);
  return createBoundingBox(Math.min(...ys), Math.max(...ys), Math.min(...xs), Math.max(...xs));
}

export function requireBoundingBox(landmarks: LandmarkMap): BoundingBox {
  const box = boundingBoxFromLandmarks(landmarks);
  if (!box) throw new UndefinedRegionError();
  return box;
}

export function assertBoxWithinGrid(box: BoundingBox, grid: Pick<PixelGrid, "rows" | "cols">): void {
  if (box.minRow > box.maxRow || box.minCol > box.maxCol) {
    throw new BoundsError(`region ${formatBoundingBox(box)} is inverted`);
  }
  if (box.minRow < 0 || box.minCol < 0 || box.maxRow >= grid.rows || box.maxCol >= grid.cols) {
    throw new BoundsError(
      `region ${formatBoundingBox(box)} does not fit a ${grid.cols}x${grid.rows} image`
    );
  }
}

/** `minRow maxRow minCol maxCol`, the order the region record uses. */
export function formatBoundingBox(box: BoundingBox): string {
  return `${box.minRow} ${box.maxRow} ${box.minCol} ${box.maxCol}`;
}
