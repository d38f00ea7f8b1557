import type { Centroid, ShapeDescriptors } from "../types/detection";

export type PixelMoments = ShapeDescriptors & {
  area: number;
  centroid: Centroid;
};

/**
 * Area, centroid and the ellipse with the same second moments as the pixel set.
 * Pixel coordinates are taken at pixel centres; the 1/12 term is the variance of a unit pixel.
 */
export function pixelMoments(pixels: readonly number[], width: number): PixelMoments {
  const area = pixels.length;
  if (area === 0) {
    return { area: 0, centroid: { x: 0, y: 0 }, majorAxis: 0, minorAxis: 0, angle: 0 };
  }

  let sumX = 0;
  let sumY = 0;
  for (const index of pixels) {
    sumX += index % width;
    sumY += Math.floor(index / width);
  }
  const cx = sumX / area;
  const cy = sumY / area;

  let xx = 0;
  let yy = 0;
  let xy = 0;
  for (const index of pixels) {
    const dx = (index % width) - cx;
    const dy = Math.floor(index / width) - cy;
    xx += dx * dx;
    yy += dy * dy;
    xy += dx * dy;
  }
  const uxx = xx / area + 1 / 12;
  const uyy = yy / area + 1 / 12;
  const uxy = xy / area;

  const common = Math.sqrt((uxx - uyy) * (uxx - uyy) + 4 * uxy * uxy);
  return {
    area,
    centroid: { x: cx, y: cy },
    majorAxis: 2 * Math.sqrt(2 * (uxx + uyy + common)),
    minorAxis: 2 * Math.sqrt(Math.max(0, 2 * (uxx + uyy - common))),
    angle: 0.5 * Math.atan2(2 * uxy, uxx - uyy)
  };
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[middle];
  }
  return (sorted[middle - 1] + sorted[middle]) / 2;
}
