import { PivotOptions, parsePivotOptions } from "../config";
import { EmptyStateError } from "../errors";
import type { DetectionRegistry } from "../registry/detectionRegistry";
import { FramedRegion, UNASSIGNED_TRACK_ID } from "../types/detection";

export type TrackColumn = {
  key: string;
  trackId: number;
  channel: number;
};

/**
 * One row per frame (1..last frame) and one column per track and channel. Cells with no
 * observation hold `missingValue`. When several rows share a track and a frame, the
 * row latest in table order fills the cells; `overwritten` counts the rows it displaced.
 */
export type TrackMatrix = {
  columns: TrackColumn[];
  frames: number[];
  values: (number | null)[][];
  missingValue: number | null;
  overwritten: number;
};

export function columnKey(trackId: number, channel: number): string {
  return `track_${trackId}_channel_${channel}`;
}

export function pivotTracks<G extends FramedRegion>(
  registry: DetectionRegistry<G>,
  options: Partial<PivotOptions> = {}
): TrackMatrix {
  const { missingValue } = parsePivotOptions(options);
  const rows = registry.rows();
  if (rows.length === 0) {
    throw new EmptyStateError("pivot tracks");
  }

  const channels = rows.reduce((max, row) => Math.max(max, row.channelMeans.length), 0);
  const lastFrame = registry.maxFrame();
  const columns: TrackColumn[] = [];
  const columnIndex = new Map<string, number>();
  for (const trackId of registry.trackIds()) {
    for (let channel = 1; channel <= channels; channel += 1) {
      const key = columnKey(trackId, channel);
      columnIndex.set(key, columns.length);
      columns.push({ key, trackId, channel });
    }
  }

  const frames = Array.from({ length: lastFrame }, (_, index) => index + 1);
  const values = frames.map(() => columns.map((): number | null => missingValue));

  const filled = new Set<string>();
  let overwritten = 0;
  for (const row of rows) {
    if (row.trackId === UNASSIGNED_TRACK_ID) {
      continue;
    }
    const slot = `${row.trackId}:${row.frame}`;
    if (filled.has(slot)) {
      overwritten += 1;
    }
    filled.add(slot);
    const cells = values[row.frame - 1];
    row.channelMeans.forEach((mean, offset) => {
      const column = columnIndex.get(columnKey(row.trackId, offset + 1));
      if (cells && column !== undefined) {
        cells[column] = mean;
      }
    });
  }

  return { columns, frames, values, missingValue, overwritten };
}

/** Values of one column in frame order. */
export function columnSeries(matrix: TrackMatrix, column: number): (number | null)[] {
  return matrix.values.map((cells) => cells[column] ?? null);
}
