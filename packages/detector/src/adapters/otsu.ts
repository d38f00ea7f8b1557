import type { ImagePlane } from "@nuctrack/track-core";

const BINS = 256;

/**
 * Otsu threshold over a 256-bin histogram spanning the plane's own range, in plane units.
 * Values at or above it are foreground; a uniform plane has none.
 */
export function otsuThreshold(plane: ImagePlane): number {
  const { data } = plane;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < data.length; i += 1) {
    min = Math.min(min, data[i]);
    max = Math.max(max, data[i]);
  }
  if (!(max > min)) {
    return Number.POSITIVE_INFINITY;
  }

  const scale = (BINS - 1) / (max - min);
  const histogram = new Float64Array(BINS);
  for (let i = 0; i < data.length; i += 1) {
    histogram[Math.round((data[i] - min) * scale)] += 1;
  }

  const total = data.length;
  let sumAll = 0;
  for (let bin = 0; bin < BINS; bin += 1) {
    sumAll += bin * histogram[bin];
  }

  let weightBackground = 0;
  let sumBackground = 0;
  let bestVariance = -1;
  let bestBin = 0;
  for (let bin = 0; bin < BINS; bin += 1) {
    weightBackground += histogram[bin];
    if (weightBackground === 0) {
      continue;
    }
    const weightForeground = total - weightBackground;
    if (weightForeground === 0) {
      break;
    }
    sumBackground += bin * histogram[bin];
    const meanBackground = sumBackground / weightBackground;
    const meanForeground = (sumAll - sumBackground) / weightForeground;
    const variance =
      weightBackground * weightForeground * (meanBackground - meanForeground) ** 2;
    if (variance > bestVariance) {
      bestVariance = variance;
      bestBin = bin;
    }
  }

  return min + (bestBin + 0.5) / scale;
}
