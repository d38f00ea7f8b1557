import { describe, expect, it } from "vitest";

import { EmptyStateError } from "../errors";
import { DetectionRegistry } from "../registry/detectionRegistry";
import type { FramedRegion } from "../types/detection";
import { commandForEvent, reduceCorrection } from "./correctionStateMachine";
import type { CorrectionState } from "./types";

const SHAPE = { majorAxis: 8, minorAxis: 6, angle: 0 };

function registryWithTrack(frames: number[]) {
  const registry = new DetectionRegistry<FramedRegion>();
  for (const frame of frames) {
    registry.append(
      { frame, centroid: { x: 20, y: 20 }, area: 40, shape: SHAPE, trackId: 2 },
      { frame }
    );
  }
  return registry;
}

describe("correctionStateMachine", () => {
  it("selects on a plain cursor event and leaves the registry alone", () => {
    const registry = registryWithTrack([1, 2, 3]);

    const output = reduceCorrection(
      { status: "idle" },
      { type: "CURSOR", x: 21, y: 20, frame: 2, modifiers: {} },
      registry
    );

    expect(output.state).toEqual({
      status: "selection",
      selection: { index: 1, frame: 2, trackId: 2, distance: 1 }
    });
    expect(output.outcome).toBeUndefined();
    expect(registry.count()).toBe(3);
  });

  it("runs a delete and returns to idle", () => {
    const registry = registryWithTrack([1, 2, 3, 4]);
    let state: CorrectionState = { status: "idle" };

    state = reduceCorrection(
      state,
      { type: "CURSOR", x: 20, y: 20, frame: 3, modifiers: {} },
      registry
    ).state;
    const output = reduceCorrection(
      state,
      { type: "CURSOR", x: 20, y: 20, frame: 3, modifiers: { shift: true } },
      registry,
      { extent: "all-following" }
    );

    expect(output.state).toEqual({ status: "idle" });
    expect(output.command).toEqual({
      kind: "delete",
      target: { type: "point", x: 20, y: 20, frame: 3 },
      extent: "all-following"
    });
    expect(output.outcome).toEqual({ ok: true, kind: "delete", trackId: 2, removed: 2 });
    expect(registry.rows().map((row) => row.frame)).toEqual([1, 2]);
  });

  it("needs a track id before it can relabel", () => {
    const registry = registryWithTrack([1, 2]);
    const state: CorrectionState = { status: "idle" };

    const missing = reduceCorrection(
      state,
      { type: "CURSOR", x: 20, y: 20, frame: 1, modifiers: { ctrl: true } },
      registry
    );
    expect(missing).toEqual({ state, outcome: { ok: false, reason: "missing-track-id" } });

    const relabel = reduceCorrection(
      state,
      { type: "CURSOR", x: 20, y: 20, frame: 1, modifiers: { ctrl: true }, relabelTo: 5 },
      registry,
      { extent: "all-frames" }
    );
    expect(relabel.outcome).toEqual({
      ok: true,
      kind: "relabel",
      trackId: 2,
      newTrackId: 5,
      relabeled: 2
    });
  });

  it("maps alt to extending from the previous frame and alt+shift to the next", () => {
    const settings = { extent: "this-frame" as const };
    const base = { type: "CURSOR" as const, x: 1, y: 2, frame: 4 };

    expect(commandForEvent({ ...base, modifiers: { alt: true } }, settings)).toEqual({
      kind: "extend",
      target: { type: "point", x: 1, y: 2, frame: 4 },
      source: "previous"
    });
    expect(commandForEvent({ ...base, modifiers: { alt: true, shift: true } }, settings)).toEqual({
      kind: "extend",
      target: { type: "point", x: 1, y: 2, frame: 4 },
      source: "next"
    });
    expect(commandForEvent({ ...base, modifiers: {} }, settings)).toBeNull();
  });

  it("bridges a missed frame through alt", () => {
    const registry = registryWithTrack([1, 2, 4]);

    const output = reduceCorrection(
      { status: "idle" },
      { type: "CURSOR", x: 20, y: 20, frame: 3, modifiers: { alt: true } },
      registry
    );

    expect(output.outcome).toEqual({ ok: true, kind: "extend", trackId: 2, sourceIndex: 1, index: 3 });
    expect(registry.track(2).detections.map((row) => row.frame)).toEqual([1, 2, 3, 4]);
  });

  it("goes back to idle on reset or on an empty frame", () => {
    const registry = registryWithTrack([1]);
    const selected: CorrectionState = {
      status: "selection",
      selection: { index: 0, frame: 1, trackId: 2, distance: 0 }
    };

    expect(reduceCorrection(selected, { type: "RESET" }, registry).state).toEqual({
      status: "idle"
    });
    expect(
      reduceCorrection(
        selected,
        { type: "CURSOR", x: 0, y: 0, frame: 5, modifiers: {} },
        registry
      )
    ).toEqual({ state: { status: "idle" }, outcome: { ok: false, reason: "nothing-to-select" } });
  });

  it("throws EmptyStateError when there is nothing loaded", () => {
    const registry = new DetectionRegistry<FramedRegion>();

    expect(() =>
      reduceCorrection(
        { status: "idle" },
        { type: "CURSOR", x: 0, y: 0, frame: 1, modifiers: { shift: true } },
        registry
      )
    ).toThrow(EmptyStateError);
  });
});
