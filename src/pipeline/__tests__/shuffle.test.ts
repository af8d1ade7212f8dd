import fs from "fs";
import os from "os";
import path from "path";
import sharp from "sharp";

import { createBoundingBox } from "../../core/boundingBox";
import { KeyVector } from "../../core/key";
import { scramble } from "../../core/permutation";
import { RawPixelGrid } from "../../core/pixelGrid";
import { keyBased, noShuffle } from "../../core/strategy";
import { UndefinedRegionError } from "../../errors";
import { loadImage } from "../../image/imageFile";
import type { LandmarkDetector, LandmarkMap } from "../../landmarks/types";
import { saveOutcome, scrambleImage, unscrambleImage } from "../shuffle";

const WIDTH = 6;
const HEIGHT = 8;

function gradient(): RawPixelGrid {
  const grid = RawPixelGrid.blank(WIDTH, HEIGHT, 3);
  for (let r = 0; r < HEIGHT; r++) {
    for (let c = 0; c < WIDTH; c++) grid.set(r, c, [r * 30, c * 40, 100]);
  }
  return grid;
}

function fixedDetector(landmarks: LandmarkMap): LandmarkDetector {
  return { name: "fixed", detect: async () => landmarks };
}

// landmarks spanning rows 1..6 and columns 1..4
const FACE: LandmarkMap = new Map([
  [1, { x: 1, y: 1 }],
  [2, { x: 4, y: 6 }],
  [3, { x: 2, y: 3 }],
]);
const KEY = new KeyVector([12, 7, 199, 40, 3, 3, 88, 150, 61, 20]);

describe("image shuffle pipeline", () => {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "shuffle-"));
  const imagePath = path.join(tmpDir, "portrait.png");

  beforeAll(async () => {
    const source = gradient();
    await sharp(Buffer.from(source.data), { raw: { width: WIDTH, height: HEIGHT, channels: 3 } })
      .png()
      .toFile(imagePath);
  });

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("scrambles the landmark region and saves image and region record", async () => {
    const outcome = await scrambleImage({
      imagePath,
      outputDir: tmpDir,
      strategy: keyBased(KEY),
      detector: fixedDetector(FACE),
    });
    expect(outcome.region).toEqual({ minRow: 1, maxRow: 6, minCol: 1, maxCol: 4 });
    expect(outcome.destination).toEqual({ kind: "scrambled", path: path.join(tmpDir, "portrait_Scrambled.png") });
    expect(fs.existsSync(outcome.destination.path)).toBe(false);

    const saved = await saveOutcome(outcome);
    expect(saved).toBe(path.join(tmpDir, "portrait_Scrambled.png"));
    expect(fs.readFileSync(path.join(tmpDir, "portrait_Landmarks.txt"), "utf8")).toBe("1 6 1 4");

    const expected = gradient();
    scramble(expected, outcome.region, KEY);
    const written = await loadImage(saved);
    expect(Buffer.from(written.data).equals(Buffer.from(expected.data))).toBe(true);
    expect(Buffer.from(written.data).equals(Buffer.from(gradient().data))).toBe(false);

    // rows end up as 0 3 6 1 4 2 5 7 inside the region's columns
    expect(Array.from(written.get(1, 1))).toEqual([90, 40, 100]);
    expect(Array.from(written.get(1, 0))).toEqual([30, 0, 100]);
    expect(Array.from(written.get(5, 4))).toEqual([60, 160, 100]);
  });

  it("restores the original from the scrambled file", async () => {
    const outcome = await unscrambleImage({
      imagePath: path.join(tmpDir, "portrait_Scrambled.png"),
      outputDir: tmpDir,
      strategy: keyBased(KEY),
      region: createBoundingBox(1, 6, 1, 4),
    });
    expect(outcome.regionRecord).toBeUndefined();
    const saved = await saveOutcome(outcome);
    expect(saved).toBe(path.join(tmpDir, "portrait_Unscrambled.png"));

    const restored = await loadImage(saved);
    expect(Buffer.from(restored.data).equals(Buffer.from(gradient().data))).toBe(true);
  });

  it("refuses to scramble when no face is found", async () => {
    await expect(
      scrambleImage({ imagePath, outputDir: tmpDir, strategy: keyBased(KEY), detector: fixedDetector(new Map()) })
    ).rejects.toThrow(UndefinedRegionError);
  });

  it("passes pixels through with no shuffle", async () => {
    const outcome = await scrambleImage({
      imagePath,
      outputDir: tmpDir,
      strategy: noShuffle,
      detector: fixedDetector(FACE),
    });
    expect(Buffer.from(outcome.grid.data).equals(Buffer.from(gradient().data))).toBe(true);
  });
});
