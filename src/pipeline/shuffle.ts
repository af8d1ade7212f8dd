/**
 * Image-level scramble and unscramble.
 *
 * Each run decodes the source image afresh, so there is no "current state"
 * to reset: the outcome carries the shuffled grid together with where it is
 * meant to go, and nothing is written until `saveOutcome` is called.
 */

import { formatBoundingBox, requireBoundingBox, type BoundingBox } from "../core/boundingBox";
import type { RawPixelGrid } from "../core/pixelGrid";
import { applyStrategy, type ShuffleStrategy } from "../core/strategy";
import { loadImage, saveImage } from "../image/imageFile";
import { destinationFor, regionRecordPath, type Destination } from "../image/outputPaths";
import { writeRegionRecord } from "../image/regionRecord";
import type { LandmarkDetector } from "../landmarks/types";
import { dLog, nLog } from "../logger";

export interface ShuffleOutcome {
  grid: RawPixelGrid;
  region: BoundingBox;
  destination: Destination;
  /** Set after scrambling; the region record to write beside the image */
  regionRecord?: string;
}

export interface ScrambleImageOptions {
  imagePath: string;
  outputDir: string;
  strategy: ShuffleStrategy;
  detector: LandmarkDetector;
}

export interface UnscrambleImageOptions {
  imagePath: string;
  outputDir: string;
  strategy: ShuffleStrategy;
  /** Region recorded when the image was scrambled */
  region: BoundingBox;
}

function describeStrategy(strategy: ShuffleStrategy): string {
  return strategy.kind === "key-based" ? `key-based (${strategy.key.length} terms)` : "none";
}

export async function scrambleImage(opts: ScrambleImageOptions): Promise<ShuffleOutcome> {
  const landmarks = await opts.detector.detect(opts.imagePath);
  const region = requireBoundingBox(landmarks);
  dLog(`[scramble] detector=${opts.detector.name} landmarks=${landmarks.size} region=${formatBoundingBox(region)}`);

  const grid = await loadImage(opts.imagePath);
  const pairs = applyStrategy(opts.strategy, "scramble", grid, region);
  dLog(`[scramble] strategy=${describeStrategy(opts.strategy)} swaps=${pairs.length}`);
  if (pairs.length > 0) {
    dLog(`[scramble] pairs=${pairs.map((p) => `${p.row}:${p.partner}`).join(",")}`);
  }

  return {
    grid,
    region,
    destination: destinationFor("scrambled", opts.imagePath, opts.outputDir),
    regionRecord: regionRecordPath(opts.imagePath, opts.outputDir),
  };
}

/**
 * The key and region must be the ones the image was scrambled with. A
 * mismatch cannot be detected here and yields a wrong image, not an error.
 */
export async function unscrambleImage(opts: UnscrambleImageOptions): Promise<ShuffleOutcome> {
  const grid = await loadImage(opts.imagePath);
  const pairs = applyStrategy(opts.strategy, "unscramble", grid, opts.region);
  dLog(`[unscramble] strategy=${describeStrategy(opts.strategy)} region=${formatBoundingBox(opts.region)} swaps=${pairs.length}`);

  return {
    grid,
    region: opts.region,
    destination: destinationFor("unscrambled", opts.imagePath, opts.outputDir),
  };
}

/** Write the grid (and the region record, when there is one). Returns the image path. */
export async function saveOutcome(outcome: ShuffleOutcome): Promise<string> {
  await saveImage(outcome.grid, outcome.destination.path);
  nLog(`[${outcome.destination.kind}] ✅ saved ${outcome.destination.path}`);

  if (outcome.regionRecord) {
    await writeRegionRecord(outcome.region, outcome.regionRecord);
    nLog(`[${outcome.destination.kind}] region ${formatBoundingBox(outcome.region)} recorded in ${outcome.regionRecord}`);
  }
  return outcome.destination.path;
}
