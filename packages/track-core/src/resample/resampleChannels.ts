import { EmptyStateError } from "../errors";
import type { MeasurementPort } from "../ports";
import type { DetectionRegistry } from "../registry/detectionRegistry";
import type { FramedRegion } from "../types/detection";
import type { ImageStack } from "../types/image";

export type ResampleSummary = {
  rows: number;
  channels: number;
};

/**
 * Re-measures every region against each channel plane of its frame and stores one mean
 * per channel. Shape and position come from the first channel; linkage fields are
 * carried across the sweep untouched.
 */
export function resampleChannels<G extends FramedRegion>(
  registry: DetectionRegistry<G>,
  stack: ImageStack,
  measurer: MeasurementPort<G>
): ResampleSummary {
  const rows = registry.rows();
  if (rows.length === 0) {
    throw new EmptyStateError("resample channels");
  }

  const linkage = rows.map((row) => ({
    trackId: row.trackId,
    displacement: row.displacement
  }));
  const means: number[][] = rows.map(() => []);

  for (let channel = 1; channel <= stack.channels; channel += 1) {
    rows.forEach((row, index) => {
      const measurement = measurer.measure(row.geometry, stack.plane(row.frame, channel));
      means[index]?.push(measurement.mean);
      if (channel === 1) {
        registry.update(index, {
          area: measurement.area,
          centroid: measurement.centroid,
          shape: measurement.shape
        });
      }
    });
  }

  linkage.forEach((saved, index) => {
    registry.update(index, {
      trackId: saved.trackId,
      displacement: saved.displacement,
      channelMeans: means[index] ?? []
    });
  });

  return { rows: linkage.length, channels: stack.channels };
}
