export * from "./types";
export * from "./config";
export * from "./adapters/otsu";
export * from "./adapters/thresholdDetector";
export * from "./adapters/pixelMeasurement";
export * from "./mock/scriptedDetector";
