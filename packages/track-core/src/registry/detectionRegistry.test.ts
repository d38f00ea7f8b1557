import { describe, expect, it } from "vitest";

import { ConsistencyError } from "../errors";
import { DetectionRegistry } from "./detectionRegistry";
import { InMemoryRegionStore } from "./regionStore";

type TestRegion = { frame: number; label: string };

const SHAPE = { majorAxis: 10, minorAxis: 8, angle: 0 };

function addDetection(
  registry: DetectionRegistry<TestRegion>,
  frame: number,
  label: string,
  x = 0
): number {
  return registry.append(
    { frame, centroid: { x, y: 0 }, area: 50, shape: SHAPE },
    { frame, label }
  );
}

describe("DetectionRegistry", () => {
  it("keeps the region store in step through appends and deletes", () => {
    const store = new InMemoryRegionStore<TestRegion>();
    const registry = new DetectionRegistry(store);

    addDetection(registry, 1, "a");
    addDetection(registry, 1, "b");
    addDetection(registry, 2, "c");
    expect(registry.count()).toBe(3);
    expect(store.count()).toBe(3);

    registry.deleteAt(1);
    expect(registry.count()).toBe(2);
    expect(store.count()).toBe(2);
    expect(store.get(1)?.label).toBe("c");
    expect(registry.at(1)?.geometry.label).toBe("c");

    registry.reset();
    expect(registry.count()).toBe(0);
    expect(store.count()).toBe(0);
  });

  it("defaults new rows to unassigned", () => {
    const registry = new DetectionRegistry<TestRegion>();
    const index = addDetection(registry, 3, "a");
    const row = registry.at(index);

    expect(row?.trackId).toBe(0);
    expect(row?.displacement).toBe(0);
    expect(row?.channelMeans).toEqual([]);
  });

  it("raises ConsistencyError when the region store is changed behind its back", () => {
    const store = new InMemoryRegionStore<TestRegion>();
    const registry = new DetectionRegistry(store);
    addDetection(registry, 1, "a");

    store.add({ frame: 1, label: "stray" });

    expect(() => registry.count()).toThrow(ConsistencyError);
    expect(() => addDetection(registry, 2, "b")).toThrow(ConsistencyError);
  });

  it("rejects a store that is already out of step", () => {
    const store = new InMemoryRegionStore<TestRegion>();
    store.add({ frame: 1, label: "orphan" });

    expect(() => new DetectionRegistry(store)).toThrow(ConsistencyError);
  });

  it("throws on deleting an index it does not hold", () => {
    const registry = new DetectionRegistry<TestRegion>();
    addDetection(registry, 1, "a");

    expect(() => registry.deleteAt(4)).toThrow(RangeError);
    expect(registry.count()).toBe(1);
  });

  it("derives tracks ordered by frame", () => {
    const registry = new DetectionRegistry<TestRegion>();
    const late = addDetection(registry, 3, "late");
    const early = addDetection(registry, 1, "early");
    const other = addDetection(registry, 2, "other");
    registry.update(late, { trackId: 4 });
    registry.update(early, { trackId: 4 });
    registry.update(other, { trackId: 2 });

    expect(registry.trackIds()).toEqual([2, 4]);
    expect(registry.track(4).detections.map((row) => row.geometry.label)).toEqual([
      "early",
      "late"
    ]);
    expect(registry.maxFrame()).toBe(3);
  });

  it("lists the frames that hold detections", () => {
    const registry = new DetectionRegistry<TestRegion>();
    addDetection(registry, 5, "a");
    addDetection(registry, 2, "b");
    addDetection(registry, 5, "c");

    expect(registry.framesPresent()).toEqual([2, 5]);
    expect(new DetectionRegistry<TestRegion>().framesPresent()).toEqual([]);
  });
});
