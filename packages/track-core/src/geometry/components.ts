import type { BinaryMask } from "../types/image";

export type ComponentLabels = {
  width: number;
  height: number;
  labels: Int32Array;
  count: number;
};

export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1]
];

/** 8-connected labelling; labels start at 1 and follow the raster order of each component's first pixel. */
export function labelComponents(mask: BinaryMask): ComponentLabels {
  const { width, height, data } = mask;
  const labels = new Int32Array(width * height);
  const queue: number[] = [];
  let count = 0;

  for (let start = 0; start < data.length; start += 1) {
    if (data[start] === 0 || labels[start] !== 0) {
      continue;
    }
    count += 1;
    labels[start] = count;
    queue.length = 0;
    queue.push(start);

    for (let head = 0; head < queue.length; head += 1) {
      const index = queue[head];
      const x = index % width;
      const y = (index - x) / width;
      for (const [dx, dy] of NEIGHBOR_OFFSETS) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
          continue;
        }
        const neighbor = ny * width + nx;
        if (data[neighbor] !== 0 && labels[neighbor] === 0) {
          labels[neighbor] = count;
          queue.push(neighbor);
        }
      }
    }
  }

  return { width, height, labels, count };
}

/** Pixel indices of every label, in raster order; entry 0 is the background. */
export function pixelsByLabel(components: ComponentLabels): number[][] {
  const groups: number[][] = Array.from({ length: components.count + 1 }, () => []);
  components.labels.forEach((label, index) => {
    if (label > 0) {
      groups[label]?.push(index);
    }
  });
  return groups;
}
