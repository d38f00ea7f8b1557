import { trackIdSchema, parseConfig } from "../config";
import { EmptyStateError } from "../errors";
import { findNearestInFrame, indexByFrame } from "../linkage/nearestNeighbor";
import type { DetectionRegistry } from "../registry/detectionRegistry";
import { FramedRegion, UNASSIGNED_TRACK_ID } from "../types/detection";
import type {
  CorrectionCommand,
  CorrectionExtent,
  CorrectionOutcome,
  CorrectionTarget,
  ExtendSource,
  PointTarget,
  Selection
} from "./types";

/**
 * Resolves a target to one detection. A point picks the nearest detection of its frame
 * with no distance ceiling; null means the frame holds nothing to pick.
 */
export function selectDetection<G extends FramedRegion>(
  registry: DetectionRegistry<G>,
  target: CorrectionTarget
): Selection | null {
  const rows = registry.rows();
  if (rows.length === 0) {
    throw new EmptyStateError("select a detection");
  }

  if (target.type === "row") {
    const row = rows[target.index];
    return row
      ? { index: target.index, frame: row.frame, trackId: row.trackId, distance: 0 }
      : null;
  }

  const match = findNearestInFrame(rows, indexByFrame(rows), target.frame, target);
  const row = match ? rows[match.index] : undefined;
  if (!match || !row) {
    return null;
  }
  return { index: match.index, frame: row.frame, trackId: row.trackId, distance: match.distance };
}

/**
 * Rows a delete or relabel with this extent applies to, highest index first. An unlinked
 * detection has no track to extend the edit over, so only the selection itself is returned.
 */
export function rowsInExtent<G extends FramedRegion>(
  registry: DetectionRegistry<G>,
  selection: Selection,
  extent: CorrectionExtent
): number[] {
  if (extent === "this-frame" || selection.trackId === UNASSIGNED_TRACK_ID) {
    return [selection.index];
  }

  const indices: number[] = [];
  registry.rows().forEach((row, index) => {
    if (row.trackId === selection.trackId && frameInExtent(extent, row.frame, selection.frame)) {
      indices.push(index);
    }
  });
  return indices.sort((a, b) => b - a);
}

function frameInExtent(extent: CorrectionExtent, frame: number, selectedFrame: number): boolean {
  switch (extent) {
    case "this-frame":
      return frame === selectedFrame;
    case "all-frames":
      return true;
    case "all-previous":
      return frame <= selectedFrame;
    case "all-following":
      return frame >= selectedFrame;
  }
}

export function applyCorrection<G extends FramedRegion>(
  registry: DetectionRegistry<G>,
  command: CorrectionCommand
): CorrectionOutcome {
  if (command.kind === "extend") {
    return extendTrack(registry, command.target, command.source);
  }

  const selection = selectDetection(registry, command.target);
  if (!selection) {
    return { ok: false, reason: "nothing-to-select" };
  }
  const indices = rowsInExtent(registry, selection, command.extent);

  if (command.kind === "delete") {
    for (const index of indices) {
      registry.deleteAt(index);
    }
    registry.assertConsistent();
    return { ok: true, kind: "delete", trackId: selection.trackId, removed: indices.length };
  }

  const newTrackId = parseConfig(trackIdSchema, command.newTrackId, "relabel");
  for (const index of indices) {
    registry.update(index, { trackId: newTrackId });
  }
  return {
    ok: true,
    kind: "relabel",
    trackId: selection.trackId,
    newTrackId,
    relabeled: indices.length
  };
}

/**
 * Fills the detection missing at the target frame by copying the nearest detection of
 * the neighbouring frame, geometry included, into the target frame under the same track.
 * Both frames must lie within 1..the registry's last frame.
 */
function extendTrack<G extends FramedRegion>(
  registry: DetectionRegistry<G>,
  target: PointTarget,
  source: ExtendSource
): CorrectionOutcome {
  const sourceFrame = source === "previous" ? target.frame - 1 : target.frame + 1;
  if (registry.count() === 0) {
    throw new EmptyStateError("extend a track");
  }
  const lastFrame = registry.maxFrame();
  if (!inSequence(target.frame, lastFrame) || !inSequence(sourceFrame, lastFrame)) {
    return { ok: false, reason: "frame-out-of-range" };
  }

  const selection = selectDetection(registry, { ...target, frame: sourceFrame });
  const original = selection ? registry.at(selection.index) : undefined;
  if (!selection || !original) {
    return { ok: false, reason: "nothing-to-select" };
  }

  const index = registry.append(
    {
      frame: target.frame,
      centroid: original.centroid,
      area: original.area,
      shape: original.shape,
      channelMeans: original.channelMeans,
      trackId: original.trackId,
      displacement: 0
    },
    { ...original.geometry, frame: target.frame }
  );
  return { ok: true, kind: "extend", trackId: original.trackId, sourceIndex: selection.index, index };
}

function inSequence(frame: number, lastFrame: number): boolean {
  return Number.isInteger(frame) && frame >= 1 && frame <= lastFrame;
}
