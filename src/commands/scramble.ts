import type { ShuffleConfig } from "../config";
import { KEY_MAX_VALUE, KEY_MIN_VALUE } from "../constants";
import { KeyVector } from "../core/key";
import { SeededRandom, systemRandom } from "../core/random";
import { keyBased } from "../core/strategy";
import { resolveOutputDir } from "../image/outputPaths";
import { JsonLandmarkDetector } from "../landmarks/jsonLandmarks";
import type { LandmarkDetector } from "../landmarks/types";
import { nLog } from "../logger";
import { saveOutcome, scrambleImage, type ShuffleOutcome } from "../pipeline/shuffle";
import { validateUserKey, type ScrambleArgs } from "./args";

export function buildScrambleKey(args: ScrambleArgs, config: ShuffleConfig): KeyVector {
  if (args.key) {
    validateUserKey(args.key);
    return new KeyVector(args.key);
  }

  const seed = args.seed ?? config.seed;
  const random = seed === undefined ? systemRandom : new SeededRandom(seed);
  const key = KeyVector.random(KEY_MIN_VALUE, KEY_MAX_VALUE, config.randomKeyLength, random);
  // The generated key is the only way back; it must reach the user even in quiet mode.
  console.log(`[scramble] generated key (keep it to unscramble): ${key.values.join(" ")}`);
  return key;
}

export async function runScramble(
  args: ScrambleArgs,
  config: ShuffleConfig,
  detector: LandmarkDetector = new JsonLandmarkDetector(args.landmarks)
): Promise<ShuffleOutcome> {
  const key = buildScrambleKey(args, config);
  const outputDir = await resolveOutputDir(args.image, args.output ?? config.outputDir);

  nLog(`[scramble] ${args.image}`);
  const outcome = await scrambleImage({
    imagePath: args.image,
    outputDir,
    strategy: keyBased(key),
    detector,
  });
  await saveOutcome(outcome);
  return outcome;
}
