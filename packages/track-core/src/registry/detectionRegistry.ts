import { ConsistencyError } from "../errors";
import {
  Detection,
  DetectionInput,
  DetectionPatch,
  FramedRegion,
  UNASSIGNED_TRACK_ID
} from "../types/detection";
import { InMemoryRegionStore, RegionStore } from "./regionStore";

export type TrackView<G extends FramedRegion = FramedRegion> = {
  trackId: number;
  detections: Readonly<Detection<G>>[];
};

/**
 * Owns every detection of one analysis session. Each row carries its own geometry and
 * the registry keeps the external region store in lockstep; every read checks the two
 * counts and throws ConsistencyError when they diverge.
 *
 * Deleting a row shifts every later index down by one, so callers deleting several rows
 * must go from the highest index to the lowest.
 */
export class DetectionRegistry<G extends FramedRegion = FramedRegion> {
  private detections: Detection<G>[] = [];
  private readonly regions: RegionStore<G>;

  constructor(regions: RegionStore<G> = new InMemoryRegionStore<G>()) {
    this.regions = regions;
    this.assertConsistent();
  }

  append(input: DetectionInput, geometry: G): number {
    this.assertConsistent();
    this.detections.push({
      frame: input.frame,
      centroid: { ...input.centroid },
      area: input.area,
      shape: { ...input.shape },
      channelMeans: [...(input.channelMeans ?? [])],
      trackId: input.trackId ?? UNASSIGNED_TRACK_ID,
      displacement: input.displacement ?? 0,
      geometry
    });
    this.regions.add(geometry);
    return this.detections.length - 1;
  }

  deleteAt(index: number): void {
    this.assertConsistent();
    this.assertIndex(index);
    this.regions.removeAt(index);
    this.detections.splice(index, 1);
  }

  update(index: number, patch: DetectionPatch): void {
    this.assertConsistent();
    const detection = this.assertIndex(index);
    if (patch.centroid) {
      detection.centroid = { ...patch.centroid };
    }
    if (patch.shape) {
      detection.shape = { ...patch.shape };
    }
    if (patch.channelMeans) {
      detection.channelMeans = [...patch.channelMeans];
    }
    if (patch.area !== undefined) {
      detection.area = patch.area;
    }
    if (patch.trackId !== undefined) {
      detection.trackId = patch.trackId;
    }
    if (patch.displacement !== undefined) {
      detection.displacement = patch.displacement;
    }
  }

  reset(): void {
    this.detections = [];
    this.regions.clear();
  }

  count(): number {
    this.assertConsistent();
    return this.detections.length;
  }

  at(index: number): Readonly<Detection<G>> | undefined {
    this.assertConsistent();
    return this.detections[index];
  }

  rows(): readonly Readonly<Detection<G>>[] {
    this.assertConsistent();
    return this.detections;
  }

  /** Distinct frames holding at least one detection, ascending. */
  framesPresent(): number[] {
    return [...new Set(this.rows().map((detection) => detection.frame))].sort((a, b) => a - b);
  }

  maxFrame(): number {
    return this.rows().reduce((max, detection) => Math.max(max, detection.frame), 0);
  }

  trackIds(): number[] {
    const ids = new Set<number>();
    for (const detection of this.rows()) {
      if (detection.trackId !== UNASSIGNED_TRACK_ID) {
        ids.add(detection.trackId);
      }
    }
    return [...ids].sort((a, b) => a - b);
  }

  track(trackId: number): TrackView<G> {
    const detections = this.rows()
      .filter((detection) => detection.trackId === trackId)
      .sort((a, b) => a.frame - b.frame);
    return { trackId, detections };
  }

  assertConsistent(): void {
    const regions = this.regions.count();
    if (regions !== this.detections.length) {
      throw new ConsistencyError(this.detections.length, regions);
    }
  }

  private assertIndex(index: number): Detection<G> {
    const detection = this.detections[index];
    if (!Number.isInteger(index) || !detection) {
      throw new RangeError(`No detection at index ${index}`);
    }
    return detection;
  }
}
