import { LinkageParams, parseLinkageParams } from "../config";
import { TrackingError } from "../errors";
import type { DetectionRegistry } from "../registry/detectionRegistry";
import type { FramedRegion } from "../types/detection";
import { DEFAULT_LINKAGE_STRATEGY } from "./greedyNearestNeighbor";
import type { LinkageStats, LinkageStrategy } from "./types";

/**
 * Recomputes track ids and displacements for the whole registry from scratch. Any ids
 * left by an earlier pass or by manual relabeling are discarded first, so running it
 * twice on the same rows gives the same answer.
 */
export function linkTracks<G extends FramedRegion>(
  registry: DetectionRegistry<G>,
  params: Partial<LinkageParams> = {},
  strategy: LinkageStrategy = DEFAULT_LINKAGE_STRATEGY
): LinkageStats {
  const config = parseLinkageParams(params);
  const rows = registry.rows();
  const { assignments, stats } = strategy.link(rows, config);

  if (assignments.length !== rows.length) {
    throw new TrackingError(
      `${strategy.name} returned ${assignments.length} assignments for ${rows.length} detections`
    );
  }
  assignments.forEach((assignment, index) => {
    registry.update(index, assignment);
  });
  return stats;
}
