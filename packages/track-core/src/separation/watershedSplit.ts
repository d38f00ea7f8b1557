import { NEIGHBOR_OFFSETS } from "../geometry/components";
import type { BinaryMask } from "../types/image";
import { euclideanDistanceMap } from "./distanceMap";

export type BoundarySegment = {
  /** Basin labels on either side, lower first. */
  labels: [number, number];
  pixels: number[];
};

export type WatershedSplit = {
  width: number;
  height: number;
  /** Basin label per pixel, 0 for background. Line pixels keep the label of their own basin. */
  labels: Int32Array;
  basins: number;
  boundaries: BoundarySegment[];
  /** The input mask with every boundary removed. */
  split: BinaryMask;
};

/**
 * Unconditional split of touching objects along the watershed of the distance map.
 * Pixels are flooded from the highest distance down, each joining the basin of its
 * steepest labelled neighbour. Basins whose peak rises no more than `tolerance` above
 * the level where they meet a higher basin are merged into it instead of being cut off.
 */
export function watershedSplit(mask: BinaryMask, tolerance: number): WatershedSplit {
  const { width, height, data } = mask;
  const distances = euclideanDistanceMap(mask);

  const order: number[] = [];
  for (let index = 0; index < data.length; index += 1) {
    if (data[index] !== 0) {
      order.push(index);
    }
  }
  order.sort((a, b) => distances[b] - distances[a] || a - b);

  const basinOf = new Int32Array(data.length);
  const parent: number[] = [0];
  const peak: number[] = [0];

  const find = (basin: number): number => {
    let root = basin;
    while (parent[root] !== root) {
      root = parent[root];
    }
    let node = basin;
    while (parent[node] !== root) {
      const next = parent[node];
      parent[node] = root;
      node = next;
    }
    return root;
  };

  for (const index of order) {
    const level = distances[index];
    const { roots, steepest } = neighbourBasins(index, width, height, distances, basinOf, find);

    if (steepest === 0) {
      const basin = parent.length;
      parent.push(basin);
      peak.push(level);
      basinOf[index] = basin;
      continue;
    }

    roots.sort((a, b) => peak[b] - peak[a] || a - b);
    const highest = roots[0];
    for (const other of roots.slice(1)) {
      if (peak[other] - level <= tolerance) {
        parent[other] = highest;
      }
    }
    basinOf[index] = steepest;
  }

  const labels = new Int32Array(data.length);
  const compact = new Map<number, number>();
  for (let index = 0; index < data.length; index += 1) {
    if (basinOf[index] === 0) {
      continue;
    }
    const root = find(basinOf[index]);
    let label = compact.get(root);
    if (label === undefined) {
      label = compact.size + 1;
      compact.set(root, label);
    }
    labels[index] = label;
  }

  const segments = new Map<string, BoundarySegment>();
  const split = { width, height, data: Uint8Array.from(data) };
  for (let index = 0; index < data.length; index += 1) {
    const own = labels[index];
    if (own === 0) {
      continue;
    }
    const x = index % width;
    const y = (index - x) / width;
    for (const [dx, dy] of NEIGHBOR_OFFSETS) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
        continue;
      }
      const other = labels[ny * width + nx];
      if (other <= own) {
        continue;
      }
      const key = `${own}:${other}`;
      let segment = segments.get(key);
      if (!segment) {
        segment = { labels: [own, other], pixels: [] };
        segments.set(key, segment);
      }
      if (segment.pixels[segment.pixels.length - 1] !== index) {
        segment.pixels.push(index);
      }
      split.data[index] = 0;
    }
  }

  return {
    width,
    height,
    labels,
    basins: compact.size,
    boundaries: [...segments.values()],
    split
  };
}

function neighbourBasins(
  index: number,
  width: number,
  height: number,
  distances: Float64Array,
  basinOf: Int32Array,
  find: (basin: number) => number
): { roots: number[]; steepest: number } {
  const x = index % width;
  const y = (index - x) / width;
  const roots: number[] = [];
  let steepest = 0;
  let steepestLevel = Number.NEGATIVE_INFINITY;
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    const nx = x + dx;
    const ny = y + dy;
    if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
      continue;
    }
    const neighbour = ny * width + nx;
    const basin = basinOf[neighbour];
    if (basin === 0) {
      continue;
    }
    const root = find(basin);
    if (!roots.includes(root)) {
      roots.push(root);
    }
    // Offsets run in raster order, so ties keep the lowest pixel index.
    if (distances[neighbour] > steepestLevel) {
      steepestLevel = distances[neighbour];
      steepest = basin;
    }
  }
  return { roots, steepest };
}
