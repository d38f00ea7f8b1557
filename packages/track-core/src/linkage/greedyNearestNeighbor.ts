import type { LinkageParams } from "../config";
import { UNASSIGNED_TRACK_ID } from "../types/detection";
import { FrameIndex, NearestMatch, findNearestInFrame, indexByFrame } from "./nearestNeighbor";
import type {
  LinkAssignment,
  LinkableDetection,
  LinkageResult,
  LinkageStats,
  LinkageStrategy
} from "./types";

/**
 * Single forward pass over table order. Each detection claims its nearest successor in
 * the first of the next `gap` frames holding any candidate within `maxDisplacement`;
 * a successor already claimed keeps whichever predecessor is strictly closer.
 */
export class GreedyNearestNeighborStrategy implements LinkageStrategy {
  readonly name = "greedy-nearest-neighbor";

  link(detections: readonly LinkableDetection[], params: LinkageParams): LinkageResult {
    const frameIndex = indexByFrame(detections);
    const lastFrame = detections.reduce((max, detection) => Math.max(max, detection.frame), 0);
    const assignments: LinkAssignment[] = detections.map(() => ({
      trackId: UNASSIGNED_TRACK_ID,
      displacement: 0
    }));
    const stats: LinkageStats = { tracks: 0, links: 0, relinks: 0, discarded: 0, terminated: 0 };
    let nextTrackId = 1;

    detections.forEach((detection, row) => {
      const current = assignments[row];
      if (!current) {
        return;
      }
      if (current.trackId === UNASSIGNED_TRACK_ID) {
        current.trackId = nextTrackId;
        nextTrackId += 1;
        stats.tracks += 1;
      }
      if (detection.frame >= lastFrame) {
        return;
      }

      const match = findSuccessor(detections, frameIndex, detection, params, lastFrame);
      if (!match) {
        stats.terminated += 1;
        return;
      }

      const successor = assignments[match.index];
      if (!successor) {
        return;
      }
      if (successor.trackId === UNASSIGNED_TRACK_ID) {
        successor.trackId = current.trackId;
        successor.displacement = match.distance;
        stats.links += 1;
      } else if (
        successor.trackId !== current.trackId &&
        successor.displacement > match.distance
      ) {
        successor.trackId = current.trackId;
        successor.displacement = match.distance;
        stats.relinks += 1;
      } else {
        stats.discarded += 1;
      }
    });

    return { assignments, stats };
  }
}

function findSuccessor(
  detections: readonly LinkableDetection[],
  frameIndex: FrameIndex,
  detection: LinkableDetection,
  params: LinkageParams,
  lastFrame: number
): NearestMatch | null {
  for (let step = 1; step <= params.gap; step += 1) {
    const frame = detection.frame + step;
    if (frame > lastFrame) {
      break;
    }
    const match = findNearestInFrame(
      detections,
      frameIndex,
      frame,
      detection.centroid,
      params.maxDisplacement
    );
    if (match) {
      return match;
    }
  }
  return null;
}

export const DEFAULT_LINKAGE_STRATEGY: LinkageStrategy = new GreedyNearestNeighborStrategy();
