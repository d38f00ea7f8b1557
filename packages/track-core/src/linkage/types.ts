import type { LinkageParams } from "../config";
import type { Centroid } from "../types/detection";

export type LinkableDetection = {
  frame: number;
  centroid: Centroid;
};

export type LinkAssignment = {
  trackId: number;
  displacement: number;
};

export type LinkageStats = {
  tracks: number;
  links: number;
  /** Links that took a successor away from a farther predecessor. */
  relinks: number;
  /** Link attempts dropped because the successor already had a closer predecessor. */
  discarded: number;
  /** Detections with no candidate within reach at any searched frame. */
  terminated: number;
};

export type LinkageResult = {
  assignments: LinkAssignment[];
  stats: LinkageStats;
};

/**
 * Turns detections in table order into one assignment per detection. Swapping the
 * strategy changes how tracks are formed without touching anything that consumes them.
 */
export interface LinkageStrategy {
  readonly name: string;
  link(detections: readonly LinkableDetection[], params: LinkageParams): LinkageResult;
}
