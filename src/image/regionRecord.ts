import fs from "fs/promises";

import { createBoundingBox, formatBoundingBox, type BoundingBox } from "../core/boundingBox";
import { ValidationError } from "../errors";
import { errorMessage } from "../utils/files";

/**
 * The region record is a single line `minRow maxRow minCol maxCol`, kept
 * beside a scrambled image so it can be unscrambled later.
 */
export async function writeRegionRecord(box: BoundingBox, recordPath: string): Promise<void> {
  await fs.writeFile(recordPath, formatBoundingBox(box), "utf8");
}

export function parseRegionRecord(text: string): BoundingBox {
  const fields = text.trim().split(/\s+/);
  if (fields.length !== 4 || !fields.every((f) => /^-?\d+$/.test(f))) {
    throw new ValidationError(`region record must hold four integers, got "${text.trim()}"`);
  }
  const [minRow, maxRow, minCol, maxCol] = fields.map(Number);
  return createBoundingBox(minRow, maxRow, minCol, maxCol);
}

export async function readRegionRecord(recordPath: string): Promise<BoundingBox> {
  let text: string;
  try {
    text = await fs.readFile(recordPath, "utf8");
  } catch (err) {
    throw new ValidationError(`cannot read region record ${recordPath}: ${errorMessage(err)}`);
  }
  return parseRegionRecord(text);
}
