// src/landmarks/jsonLandmarks.ts
// Landmark detector backed by a JSON file written by an external face
// landmark model (e.g. a 68-point predictor run ahead of time).

import fs from "fs/promises";

import { LANDMARKS_FILE_SUFFIX } from "../constants";
import { ImageIOError, ValidationError } from "../errors";
import { dLog } from "../logger";
import { errorMessage, isMissingFile, siblingOutPath } from "../utils/files";
import type { LandmarkDetector, LandmarkMap, LandmarkPoint } from "./types";

function isCoordinate(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function toPoint(value: unknown, id: number): LandmarkPoint {
  if (Array.isArray(value) && value.length === 2 && isCoordinate(value[0]) && isCoordinate(value[1])) {
    return { x: value[0], y: value[1] };
  }
  throw new ValidationError(`landmark ${id} must be an [x, y] pair of integers`);
}

function toId(raw: unknown): number {
  const id = typeof raw === "string" ? Number(raw) : raw;
  if (typeof id !== "number" || !Number.isInteger(id) || id < 1) {
    throw new ValidationError(`landmark id ${String(raw)} is not a positive integer`);
  }
  return id;
}

/**
 * Accepts either `{ "1": [x, y], ... }` or `[{ "id": 1, "x": x, "y": y }, ...]`.
 */
export function parseLandmarks(raw: unknown): LandmarkMap {
  const landmarks = new Map<number, LandmarkPoint>();

  if (Array.isArray(raw)) {
    raw.forEach((entry: unknown, index) => {
      if (typeof entry !== "object" || entry === null || !("id" in entry) || !("x" in entry) || !("y" in entry)) {
        throw new ValidationError(`landmark entry ${index} must be an object with id, x and y`);
      }
      const landmarkId = toId(entry.id);
      landmarks.set(landmarkId, toPoint([entry.x, entry.y], landmarkId));
    });
    return landmarks;
  }

  if (typeof raw === "object" && raw !== null) {
    for (const [key, value] of Object.entries(raw)) {
      const landmarkId = toId(key);
      landmarks.set(landmarkId, toPoint(value, landmarkId));
    }
    return landmarks;
  }

  throw new ValidationError("landmark file must hold a JSON object or array");
}

export function defaultLandmarksPath(imagePath: string): string {
  return siblingOutPath(imagePath, "", LANDMARKS_FILE_SUFFIX);
}

export class JsonLandmarkDetector implements LandmarkDetector {
  readonly name = "json";

  /**
   * Without `filePath`, landmarks are read from `<base>.landmarks.json` beside
   * the image, and a missing file means no face. A given `filePath` must exist.
   */
  constructor(private readonly filePath?: string) {}

  async detect(imagePath: string): Promise<LandmarkMap> {
    const source = this.filePath ?? defaultLandmarksPath(imagePath);

    let text: string;
    try {
      text = await fs.readFile(source, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      if (this.filePath !== undefined) {
        throw new ImageIOError(`landmark file ${source} does not exist`);
      }
      dLog(`[landmarks] no landmark file at ${source}`);
      return new Map();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ValidationError(`landmark file ${source} is not valid JSON: ${errorMessage(err)}`);
    }

    const landmarks = parseLandmarks(parsed);
    dLog(`[landmarks] ${landmarks.size} landmarks from ${source}`);
    return landmarks;
  }
}
