export * from "./boundingBox";
export * from "./key";
export * from "./permutation";
export * from "./pixelGrid";
export * from "./random";
export * from "./strategy";
