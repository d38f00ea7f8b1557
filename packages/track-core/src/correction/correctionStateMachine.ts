import { CorrectionSettings, DEFAULT_CORRECTION_SETTINGS } from "../config";
import type { DetectionRegistry } from "../registry/detectionRegistry";
import type { FramedRegion } from "../types/detection";
import { applyCorrection, selectDetection } from "./applyCorrection";
import type {
  CorrectionCommand,
  CorrectionEventDTO,
  CorrectionOutput,
  CorrectionState,
  PointTarget
} from "./types";

const idleState: CorrectionState = { status: "idle" };

/**
 * shift: delete, ctrl: relabel, alt: extend from the previous frame, alt+shift: extend
 * from the next frame. No modifier only selects.
 */
export function commandForEvent(
  event: Extract<CorrectionEventDTO, { type: "CURSOR" }>,
  settings: CorrectionSettings
): CorrectionCommand | "missing-track-id" | null {
  const target: PointTarget = { type: "point", x: event.x, y: event.y, frame: event.frame };
  const { shift = false, alt = false, ctrl = false } = event.modifiers;

  if (alt) {
    return { kind: "extend", target, source: shift ? "next" : "previous" };
  }
  if (ctrl) {
    const newTrackId = event.relabelTo ?? settings.relabelTrackId;
    if (newTrackId === undefined) {
      return "missing-track-id";
    }
    return { kind: "relabel", target, extent: settings.extent, newTrackId };
  }
  if (shift) {
    return { kind: "delete", target, extent: settings.extent };
  }
  return null;
}

/**
 * idle -> selection on a plain cursor event; any modified cursor event runs its action
 * against the registry and returns to idle. Throws EmptyStateError on an empty registry.
 */
export function reduceCorrection<G extends FramedRegion>(
  state: CorrectionState,
  event: CorrectionEventDTO,
  registry: DetectionRegistry<G>,
  settings: CorrectionSettings = DEFAULT_CORRECTION_SETTINGS
): CorrectionOutput {
  if (event.type === "RESET") {
    return { state: idleState };
  }

  const command = commandForEvent(event, settings);
  if (command === "missing-track-id") {
    return { state, outcome: { ok: false, reason: "missing-track-id" } };
  }

  if (command === null) {
    const selection = selectDetection(registry, {
      type: "point",
      x: event.x,
      y: event.y,
      frame: event.frame
    });
    if (!selection) {
      return { state: idleState, outcome: { ok: false, reason: "nothing-to-select" } };
    }
    return { state: { status: "selection", selection } };
  }

  const outcome = applyCorrection(registry, command);
  return { state: idleState, command, outcome };
}
