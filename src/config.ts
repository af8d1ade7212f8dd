/**
 * CLI Configuration
 *
 * Environment-driven settings, read from the process environment after
 * `.env` in the working directory has been loaded. Command line flags
 * override everything here. Log switches (SHUFFLE_DEBUG, SHUFFLE_QUIET)
 * are read by the logger itself.
 */

import * as dotenv from "dotenv";
import { DEFAULT_RANDOM_KEY_LENGTH, KEY_MAX_LENGTH, KEY_MIN_LENGTH } from "./constants";
import { getEnvInt, getEnvString } from "./utils/env";

dotenv.config();

export interface ShuffleConfig {
  /** Where output images and region records go when `--output` is absent */
  outputDir?: string;
  /** Seed for `--random` keys; unseeded keys use Math.random */
  seed?: number;
  /** Length of generated keys, clamped to the accepted key lengths */
  randomKeyLength: number;
}

export function loadShuffleConfig(): ShuffleConfig {
  const length = getEnvInt("SHUFFLE_RANDOM_KEY_LENGTH") ?? DEFAULT_RANDOM_KEY_LENGTH;
  return {
    outputDir: getEnvString("SHUFFLE_OUTPUT_DIR"),
    seed: getEnvInt("SHUFFLE_SEED"),
    randomKeyLength: Math.min(KEY_MAX_LENGTH, Math.max(KEY_MIN_LENGTH, length)),
  };
}
