export * from "./config";
export * from "./errors";
export * from "./logging";
export * from "./ports";
export * from "./types/detection";
export * from "./types/image";
export * from "./registry/regionStore";
export * from "./registry/detectionRegistry";
export * from "./linkage/types";
export * from "./linkage/nearestNeighbor";
export * from "./linkage/greedyNearestNeighbor";
export * from "./linkage/linkTracks";
export * from "./geometry/components";
export * from "./geometry/moments";
export * from "./separation/distanceMap";
export * from "./separation/watershedSplit";
export * from "./separation/conditionalSeparation";
export * from "./correction/types";
export * from "./correction/applyCorrection";
export * from "./correction/correctionStateMachine";
export * from "./resample/resampleChannels";
export * from "./resample/pivotTracks";
export * from "./series/intensityEvents";
