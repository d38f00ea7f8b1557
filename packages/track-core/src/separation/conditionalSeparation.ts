import { SeparationParams, parseSeparationParams } from "../config";
import { median, pixelMoments } from "../geometry/moments";
import { BinaryMask, ImagePlane, cloneMask } from "../types/image";
import { BoundarySegment, watershedSplit } from "./watershedSplit";

export type SeparationDecision = {
  labels: [number, number];
  boundaryPixels: number;
  /** Median intensity on the boundary over the dimmer side's median. */
  medianRatio: number;
  /** Boundary length over the minor axis of the larger side. */
  boundaryRatio: number;
  accepted: boolean;
};

export type SeparationResult = {
  mask: BinaryMask;
  decisions: SeparationDecision[];
};

/**
 * Splits fused objects only where the cut runs through an intensity dip and is short
 * relative to the objects it separates. `separate` 0 keeps every cut of the generic
 * split and 1 keeps none.
 */
export function separateTouchingObjects(
  mask: BinaryMask,
  reference: ImagePlane,
  params: Partial<SeparationParams> = {}
): SeparationResult {
  const config = parseSeparationParams(params);
  if (reference.width !== mask.width || reference.height !== mask.height) {
    throw new Error(
      `Reference image ${reference.width}x${reference.height} does not match mask ${mask.width}x${mask.height}`
    );
  }

  const result = cloneMask(mask);
  if (config.separate === 1) {
    return { mask: result, decisions: [] };
  }

  const split = watershedSplit(mask, config.splitTolerance);
  const lineIndices = new Set<number>();
  for (const boundary of split.boundaries) {
    for (const index of boundary.pixels) {
      lineIndices.add(index);
    }
  }

  const sides: number[][] = Array.from({ length: split.basins + 1 }, () => []);
  split.labels.forEach((label, index) => {
    if (label > 0 && !lineIndices.has(index)) {
      sides[label]?.push(index);
    }
  });

  const decisions = split.boundaries.map((boundary) => {
    const decision = judgeBoundary(boundary, sides, reference, mask.width, config);
    if (decision.accepted) {
      for (const index of boundary.pixels) {
        result.data[index] = 0;
      }
    }
    return decision;
  });

  return { mask: result, decisions };
}

function judgeBoundary(
  boundary: BoundarySegment,
  sides: number[][],
  reference: ImagePlane,
  width: number,
  config: SeparationParams
): SeparationDecision {
  const [first, second] = boundary.labels;
  const firstSide = sides[first] ?? [];
  const secondSide = sides[second] ?? [];
  const intensityAt = (index: number) => reference.data[index];

  const boundaryMedian = median(boundary.pixels.map(intensityAt));
  const sideMedian = Math.min(
    median(firstSide.map(intensityAt)),
    median(secondSide.map(intensityAt))
  );
  const medianRatio = sideMedian > 0 ? boundaryMedian / sideMedian : Number.POSITIVE_INFINITY;

  const larger = firstSide.length >= secondSide.length ? firstSide : secondSide;
  const { minorAxis } = pixelMoments(larger, width);
  const boundaryRatio =
    minorAxis > 0 ? boundary.pixels.length / minorAxis : Number.POSITIVE_INFINITY;

  const accepted =
    config.separate === 0 ||
    (medianRatio < config.separate && boundaryRatio < config.maxBoundaryRatio);

  return {
    labels: boundary.labels,
    boundaryPixels: boundary.pixels.length,
    medianRatio,
    boundaryRatio,
    accepted
  };
}
