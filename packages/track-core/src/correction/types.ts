import type { z } from "zod";

import type { correctionExtentSchema } from "../config";

export type CorrectionExtent = z.infer<typeof correctionExtentSchema>;

export type CursorPoint = {
  x: number;
  y: number;
};

export type PointTarget = CursorPoint & {
  type: "point";
  frame: number;
};

export type RowTarget = {
  type: "row";
  index: number;
};

export type CorrectionTarget = PointTarget | RowTarget;

export type ExtendSource = "previous" | "next";

export type CorrectionCommand =
  | { kind: "delete"; target: CorrectionTarget; extent: CorrectionExtent }
  | { kind: "relabel"; target: CorrectionTarget; extent: CorrectionExtent; newTrackId: number }
  | { kind: "extend"; target: PointTarget; source: ExtendSource };

export type Selection = {
  index: number;
  frame: number;
  trackId: number;
  distance: number;
};

export type CorrectionFailure = "nothing-to-select" | "frame-out-of-range" | "missing-track-id";

export type CorrectionOutcome =
  | { ok: true; kind: "delete"; trackId: number; removed: number }
  | { ok: true; kind: "relabel"; trackId: number; newTrackId: number; relabeled: number }
  | { ok: true; kind: "extend"; trackId: number; sourceIndex: number; index: number }
  | { ok: false; reason: CorrectionFailure };

export type ModifierFlags = {
  shift?: boolean;
  alt?: boolean;
  ctrl?: boolean;
};

export type CorrectionEventDTO =
  | {
      type: "CURSOR";
      x: number;
      y: number;
      frame: number;
      modifiers: ModifierFlags;
      relabelTo?: number;
    }
  | {
      type: "RESET";
    };

export type CorrectionState =
  | { status: "idle" }
  | { status: "selection"; selection: Selection };

export type CorrectionOutput = {
  state: CorrectionState;
  command?: CorrectionCommand;
  outcome?: CorrectionOutcome;
};
