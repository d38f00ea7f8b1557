import type { FramedRegion, RegionMeasurement } from "./types/detection";
import type { ImagePlane } from "./types/image";

/** Finds candidate regions in one conditioned frame, in a stable order. */
export interface DetectorPort<G extends FramedRegion> {
  detect(plane: ImagePlane, frame: number): G[];
}

export interface MeasurementPort<G extends FramedRegion> {
  measure(region: G, plane: ImagePlane): RegionMeasurement;
}
