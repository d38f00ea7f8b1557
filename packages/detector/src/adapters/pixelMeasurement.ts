import type { ImagePlane, MeasurementPort, RegionMeasurement } from "@nuctrack/track-core";
import { pixelMoments } from "@nuctrack/track-core";

import type { PixelRegion } from "../types";

export class PixelMeasurementAdapter implements MeasurementPort<PixelRegion> {
  measure(region: PixelRegion, plane: ImagePlane): RegionMeasurement {
    if (plane.width !== region.width || plane.height !== region.height) {
      throw new Error(
        `Region of a ${region.width}x${region.height} frame measured on a ${plane.width}x${plane.height} plane`
      );
    }

    const { area, centroid, majorAxis, minorAxis, angle } = pixelMoments(region.pixels, region.width);
    let total = 0;
    for (const index of region.pixels) {
      total += plane.data[index];
    }

    return {
      area,
      centroid,
      shape: { majorAxis, minorAxis, angle },
      mean: area > 0 ? total / area : 0
    };
  }
}
