import type { Centroid } from "../types/detection";
import type { LinkableDetection } from "./types";

export type FrameIndex = Map<number, number[]>;

export type NearestMatch = {
  index: number;
  distance: number;
};

/** Row indices per frame, each list kept in table order. */
export function indexByFrame(detections: readonly LinkableDetection[]): FrameIndex {
  const index: FrameIndex = new Map();
  detections.forEach((detection, row) => {
    const rows = index.get(detection.frame);
    if (rows) {
      rows.push(row);
    } else {
      index.set(detection.frame, [row]);
    }
  });
  return index;
}

export function centroidDistance(a: Centroid, b: Centroid): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Closest detection of `frame` to `point` no farther than `ceiling`. Ties keep the
 * earlier row.
 */
export function findNearestInFrame(
  detections: readonly LinkableDetection[],
  frameIndex: FrameIndex,
  frame: number,
  point: Centroid,
  ceiling = Number.POSITIVE_INFINITY
): NearestMatch | null {
  const rows = frameIndex.get(frame);
  if (!rows) {
    return null;
  }

  let best: NearestMatch | null = null;
  for (const index of rows) {
    const candidate = detections[index];
    if (!candidate) {
      continue;
    }
    const distance = centroidDistance(point, candidate.centroid);
    if (distance <= ceiling && (best === null || distance < best.distance)) {
      best = { index, distance };
    }
  }
  return best;
}
