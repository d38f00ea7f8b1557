import {
  BinaryMask,
  DetectorPort,
  ImagePlane,
  createMask,
  labelComponents,
  pixelsByLabel,
  separateTouchingObjects
} from "@nuctrack/track-core";

import { ThresholdDetectorParams, parseThresholdDetectorParams } from "../config";
import type { PixelRegion } from "../types";
import { otsuThreshold } from "./otsu";

/**
 * Classical detector: threshold the conditioned plane, optionally split touching nuclei,
 * then keep 8-connected components of at least `minArea` pixels.
 */
export class ThresholdDetectorAdapter implements DetectorPort<PixelRegion> {
  private readonly params: ThresholdDetectorParams;

  constructor(params: Partial<ThresholdDetectorParams> = {}) {
    this.params = parseThresholdDetectorParams(params);
  }

  detect(plane: ImagePlane, frame: number): PixelRegion[] {
    const threshold = this.params.threshold ?? otsuThreshold(plane);
    let mask = this.binarize(plane, threshold);
    if (this.params.separation) {
      mask = separateTouchingObjects(mask, plane, this.params.separation).mask;
    }

    const groups = pixelsByLabel(labelComponents(mask));
    const regions: PixelRegion[] = [];
    for (const pixels of groups.slice(1)) {
      if (pixels.length >= this.params.minArea) {
        regions.push({ frame, width: plane.width, height: plane.height, pixels });
      }
    }
    return regions;
  }

  private binarize(plane: ImagePlane, threshold: number): BinaryMask {
    const mask = createMask(plane.width, plane.height);
    for (let i = 0; i < mask.data.length; i += 1) {
      mask.data[i] = plane.data[i] >= threshold ? 1 : 0;
    }
    return mask;
  }
}
