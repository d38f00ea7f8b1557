import { describe, expect, it } from "vitest";

import { ConsistencyError, EmptyStateError } from "../errors";
import type { MeasurementPort } from "../ports";
import { DetectionRegistry } from "../registry/detectionRegistry";
import { InMemoryRegionStore } from "../registry/regionStore";
import { createImageStack } from "../types/image";
import { resampleChannels } from "./resampleChannels";

type IndexRegion = { frame: number; pixels: number[] };

const meanOfPixels: MeasurementPort<IndexRegion> = {
  measure(region, plane) {
    const total = region.pixels.reduce((sum, index) => sum + plane.data[index], 0);
    return {
      area: region.pixels.length,
      centroid: { x: region.pixels[0] ?? 0, y: 0 },
      shape: { majorAxis: region.pixels.length, minorAxis: 1, angle: 0 },
      mean: total / region.pixels.length
    };
  }
};

const SHAPE = { majorAxis: 1, minorAxis: 1, angle: 0 };

describe("resampleChannels", () => {
  it("stores one mean per channel and keeps the linkage", () => {
    const stack = createImageStack(2, 1, [
      [
        [10, 20],
        [1, 3]
      ],
      [
        [30, 50],
        [5, 7]
      ]
    ]);
    const registry = new DetectionRegistry<IndexRegion>();
    registry.append(
      { frame: 1, centroid: { x: 0, y: 0 }, area: 1, shape: SHAPE, trackId: 1 },
      { frame: 1, pixels: [0] }
    );
    registry.append(
      { frame: 1, centroid: { x: 1, y: 0 }, area: 1, shape: SHAPE, trackId: 2 },
      { frame: 1, pixels: [1] }
    );
    registry.append(
      { frame: 2, centroid: { x: 0, y: 0 }, area: 1, shape: SHAPE, trackId: 1, displacement: 3.5 },
      { frame: 2, pixels: [0, 1] }
    );

    const summary = resampleChannels(registry, stack, meanOfPixels);

    expect(summary).toEqual({ rows: 3, channels: 2 });
    expect(registry.rows().map((row) => row.channelMeans)).toEqual([
      [10, 1],
      [20, 3],
      [40, 6]
    ]);
    expect(registry.rows().map((row) => [row.trackId, row.displacement])).toEqual([
      [1, 0],
      [2, 0],
      [1, 3.5]
    ]);
    expect(registry.at(2)?.area).toBe(2);
  });

  it("replaces means from an earlier sweep", () => {
    const stack = createImageStack(1, 1, [[[8]]]);
    const registry = new DetectionRegistry<IndexRegion>();
    registry.append(
      { frame: 1, centroid: { x: 0, y: 0 }, area: 1, shape: SHAPE, channelMeans: [99, 98] },
      { frame: 1, pixels: [0] }
    );

    resampleChannels(registry, stack, meanOfPixels);

    expect(registry.at(0)?.channelMeans).toEqual([8]);
  });

  it("has nothing to resample in an empty registry", () => {
    const stack = createImageStack(1, 1, [[[8]]]);

    expect(() => resampleChannels(new DetectionRegistry<IndexRegion>(), stack, meanOfPixels)).toThrow(
      EmptyStateError
    );
  });

  it("reports the real counts when the region store drifts mid-sweep", () => {
    const stack = createImageStack(1, 1, [[[8]]]);
    const store = new InMemoryRegionStore<IndexRegion>();
    const registry = new DetectionRegistry(store);
    registry.append(
      { frame: 1, centroid: { x: 0, y: 0 }, area: 1, shape: SHAPE },
      { frame: 1, pixels: [0] }
    );
    const drifting: MeasurementPort<IndexRegion> = {
      measure(region, plane) {
        store.add({ frame: 1, pixels: [0] });
        return meanOfPixels.measure(region, plane);
      }
    };

    expect(() => resampleChannels(registry, stack, drifting)).toThrow(
      new ConsistencyError(1, 2)
    );
  });
});
