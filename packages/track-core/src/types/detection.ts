export type Centroid = {
  x: number;
  y: number;
};

export type ShapeDescriptors = {
  majorAxis: number;
  minorAxis: number;
  angle: number;
};

/**
 * Minimal view the core needs of a detector-owned region: the frame it lives in.
 * Everything else about the geometry stays opaque to the core.
 */
export type FramedRegion = {
  frame: number;
};

export type Detection<G extends FramedRegion = FramedRegion> = {
  frame: number;
  centroid: Centroid;
  area: number;
  shape: ShapeDescriptors;
  channelMeans: number[];
  /** 0 until the detection is linked into a track. */
  trackId: number;
  /** Distance to the detection this one was linked from; 0 when it starts a track. */
  displacement: number;
  geometry: G;
};

export type DetectionInput = {
  frame: number;
  centroid: Centroid;
  area: number;
  shape: ShapeDescriptors;
  channelMeans?: number[];
  trackId?: number;
  displacement?: number;
};

export type DetectionPatch = Partial<
  Pick<Detection, "centroid" | "area" | "shape" | "channelMeans" | "trackId" | "displacement">
>;

export type RegionMeasurement = {
  area: number;
  centroid: Centroid;
  shape: ShapeDescriptors;
  mean: number;
};

export const UNASSIGNED_TRACK_ID = 0;
