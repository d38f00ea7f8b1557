import type { BinaryMask } from "../types/image";

const FAR = 1e20;

/**
 * Euclidean distance from every foreground pixel to the nearest background pixel,
 * with everything outside the image counted as background. Background pixels map to 0.
 */
export function euclideanDistanceMap(mask: BinaryMask): Float64Array {
  const { width, height, data } = mask;
  const paddedWidth = width + 2;
  const paddedHeight = height + 2;
  const grid = new Float64Array(paddedWidth * paddedHeight);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      if (data[y * width + x] !== 0) {
        grid[(y + 1) * paddedWidth + (x + 1)] = FAR;
      }
    }
  }

  const longest = Math.max(paddedWidth, paddedHeight);
  const line = new Float64Array(longest);
  const out = new Float64Array(longest);
  const vertices = new Int32Array(longest);
  const bounds = new Float64Array(longest + 1);

  for (let x = 0; x < paddedWidth; x += 1) {
    for (let y = 0; y < paddedHeight; y += 1) {
      line[y] = grid[y * paddedWidth + x];
    }
    squaredDistance1d(line, paddedHeight, out, vertices, bounds);
    for (let y = 0; y < paddedHeight; y += 1) {
      grid[y * paddedWidth + x] = out[y];
    }
  }

  for (let y = 0; y < paddedHeight; y += 1) {
    const offset = y * paddedWidth;
    for (let x = 0; x < paddedWidth; x += 1) {
      line[x] = grid[offset + x];
    }
    squaredDistance1d(line, paddedWidth, out, vertices, bounds);
    for (let x = 0; x < paddedWidth; x += 1) {
      grid[offset + x] = out[x];
    }
  }

  const distances = new Float64Array(width * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      distances[y * width + x] = Math.sqrt(grid[(y + 1) * paddedWidth + (x + 1)]);
    }
  }
  return distances;
}

// Lower envelope of parabolas rooted at each sample (Felzenszwalb & Huttenlocher).
function squaredDistance1d(
  f: Float64Array,
  n: number,
  out: Float64Array,
  vertices: Int32Array,
  bounds: Float64Array
): void {
  let k = 0;
  vertices[0] = 0;
  bounds[0] = Number.NEGATIVE_INFINITY;
  bounds[1] = Number.POSITIVE_INFINITY;

  for (let q = 1; q < n; q += 1) {
    let s = intersection(f, q, vertices[k]);
    while (s <= bounds[k]) {
      k -= 1;
      s = intersection(f, q, vertices[k]);
    }
    k += 1;
    vertices[k] = q;
    bounds[k] = s;
    bounds[k + 1] = Number.POSITIVE_INFINITY;
  }

  k = 0;
  for (let q = 0; q < n; q += 1) {
    while (bounds[k + 1] < q) {
      k += 1;
    }
    const v = vertices[k];
    out[q] = (q - v) * (q - v) + f[v];
  }
}

function intersection(f: Float64Array, q: number, v: number): number {
  return (f[q] + q * q - (f[v] + v * v)) / (2 * q - 2 * v);
}
