import path from "path";

import { REGION_RECORD_SUFFIX, SCRAMBLED_SUFFIX, UNSCRAMBLED_SUFFIX } from "../constants";
import { ValidationError } from "../errors";
import { isDirectory } from "../utils/files";

export type DestinationKind = "scrambled" | "unscrambled";

/** Where a shuffled grid is meant to be written. */
export interface Destination {
  kind: DestinationKind;
  path: string;
}

function baseName(imagePath: string): string {
  return path.basename(imagePath, path.extname(imagePath));
}

export function scrambledPath(imagePath: string, outputDir: string): string {
  return path.join(outputDir, `${baseName(imagePath)}${SCRAMBLED_SUFFIX}${path.extname(imagePath)}`);
}

/** `photo_Scrambled.png` becomes `photo_Unscrambled.png`, `photo.png` becomes `photo_Unscrambled.png`. */
export function unscrambledPath(imagePath: string, outputDir: string): string {
  const base = baseName(imagePath);
  const stem = base.endsWith(SCRAMBLED_SUFFIX) ? base.slice(0, -SCRAMBLED_SUFFIX.length) : base;
  return path.join(outputDir, `${stem}${UNSCRAMBLED_SUFFIX}${path.extname(imagePath)}`);
}

export function regionRecordPath(imagePath: string, outputDir: string): string {
  return path.join(outputDir, `${baseName(imagePath)}${REGION_RECORD_SUFFIX}`);
}

export function destinationFor(kind: DestinationKind, imagePath: string, outputDir: string): Destination {
  const target = kind === "scrambled" ? scrambledPath(imagePath, outputDir) : unscrambledPath(imagePath, outputDir);
  return { kind, path: target };
}

/**
 * Output directory for an image: the requested one, which must already
 * exist, or else the directory the image lives in.
 */
export async function resolveOutputDir(imagePath: string, requested?: string): Promise<string> {
  if (requested === undefined) {
    return path.dirname(path.resolve(imagePath));
  }
  const dir = path.resolve(requested);
  if (!(await isDirectory(dir))) {
    throw new ValidationError(`output directory ${requested} does not exist or is not a directory`);
  }
  return dir;
}
