import type { ShuffleConfig } from "../config";
import { createBoundingBox, type BoundingBox } from "../core/boundingBox";
import { KeyVector } from "../core/key";
import { keyBased } from "../core/strategy";
import { UsageError } from "../errors";
import { resolveOutputDir } from "../image/outputPaths";
import { readRegionRecord } from "../image/regionRecord";
import { nLog } from "../logger";
import { saveOutcome, unscrambleImage, type ShuffleOutcome } from "../pipeline/shuffle";
import { validateUserKey, type UnscrambleArgs } from "./args";

async function resolveRegion(args: UnscrambleArgs): Promise<BoundingBox> {
  if (args.regionFile !== undefined) {
    return readRegionRecord(args.regionFile);
  }
  if (args.region) {
    const { top, bottom, left, right } = args.region;
    return createBoundingBox(top, bottom, left, right);
  }
  throw new UsageError("unscramble needs a region");
}

export async function runUnscramble(args: UnscrambleArgs, config: ShuffleConfig): Promise<ShuffleOutcome> {
  validateUserKey(args.key);
  const key = new KeyVector(args.key);
  const region = await resolveRegion(args);
  const outputDir = await resolveOutputDir(args.image, args.output ?? config.outputDir);

  nLog(`[unscramble] ${args.image}`);
  const outcome = await unscrambleImage({
    imagePath: args.image,
    outputDir,
    strategy: keyBased(key),
    region,
  });
  await saveOutcome(outcome);
  return outcome;
}
