import path from "path";
import sharp from "sharp";

import { RawPixelGrid } from "../core/pixelGrid";
import { ImageIOError } from "../errors";
import { nLog } from "../logger";
import { errorMessage } from "../utils/files";

type RawChannels = 1 | 2 | 3 | 4;

const LOSSY_EXTENSIONS = new Set([".jpg", ".jpeg", ".webp", ".avif", ".heic"]);

function rawChannels(channels: number): RawChannels {
  if (channels === 1 || channels === 2 || channels === 3 || channels === 4) return channels;
  throw new ImageIOError(`cannot encode a grid with ${channels} channels`);
}

/** Decode an image file into a grid of its raw pixels, upright per its EXIF orientation. */
export async function loadImage(imagePath: string): Promise<RawPixelGrid> {
  try {
    const { data, info } = await sharp(imagePath).rotate().raw().toBuffer({ resolveWithObject: true });
    return new RawPixelGrid(data, info.width, info.height, info.channels);
  } catch (err) {
    throw new ImageIOError(`cannot read image ${imagePath}: ${errorMessage(err)}`);
  }
}

/** Encode the grid to `outPath`; the format follows the extension. */
export async function saveImage(grid: RawPixelGrid, outPath: string): Promise<void> {
  const ext = path.extname(outPath).toLowerCase();
  if (LOSSY_EXTENSIONS.has(ext)) {
    nLog(`[image] ⚠️ ${ext} is lossy; unscrambling this file will not restore the exact pixels`);
  }

  const input = Buffer.from(grid.data.buffer, grid.data.byteOffset, grid.data.byteLength);
  try {
    await sharp(input, {
      raw: { width: grid.cols, height: grid.rows, channels: rawChannels(grid.channels) },
    }).toFile(outPath);
  } catch (err) {
    throw new ImageIOError(`cannot write image ${outPath}: ${errorMessage(err)}`);
  }
}
