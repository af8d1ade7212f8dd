export * from "./core";
export * from "./errors";
export * from "./constants";
export { loadImage, saveImage } from "./image/imageFile";
export { destinationFor, resolveOutputDir, scrambledPath, unscrambledPath, regionRecordPath, type Destination, type DestinationKind } from "./image/outputPaths";
export { parseRegionRecord, readRegionRecord, writeRegionRecord } from "./image/regionRecord";
export { JsonLandmarkDetector, parseLandmarks, defaultLandmarksPath } from "./landmarks/jsonLandmarks";
export type { LandmarkDetector } from "./landmarks/types";
export { saveOutcome, scrambleImage, unscrambleImage, type ShuffleOutcome } from "./pipeline/shuffle";
