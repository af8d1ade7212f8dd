// src/landmarks/types.ts
// Boundary with the face landmark detector.

import type { LandmarkMap } from "../core/boundingBox";

export type { LandmarkMap, LandmarkPoint } from "../core/boundingBox";

export interface LandmarkDetector {
  name: string;
  /** Landmarks of the face in the image; an empty map when no face is found. */
  detect(imagePath: string): Promise<LandmarkMap>;
}
