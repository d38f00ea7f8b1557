import type { DetectorPort, ImagePlane } from "@nuctrack/track-core";

import type { PixelRegion } from "../types";

/** Hands back pre-built regions per frame, ignoring the pixels it is given. */
export class ScriptedDetectorAdapter implements DetectorPort<PixelRegion> {
  private readonly script: Map<number, PixelRegion[]>;

  constructor(regions: PixelRegion[]) {
    this.script = new Map();
    for (const region of regions) {
      const frame = this.script.get(region.frame);
      if (frame) {
        frame.push(region);
      } else {
        this.script.set(region.frame, [region]);
      }
    }
  }

  detect(plane: ImagePlane, frame: number): PixelRegion[] {
    void plane;
    return (this.script.get(frame) ?? []).map((region) => ({ ...region, pixels: [...region.pixels] }));
  }
}

/** Square region of side `size` with its top-left pixel at (x, y). */
export function squareRegion(
  frame: number,
  width: number,
  height: number,
  x: number,
  y: number,
  size: number
): PixelRegion {
  const pixels: number[] = [];
  for (let row = y; row < y + size; row += 1) {
    for (let column = x; column < x + size; column += 1) {
      pixels.push(row * width + column);
    }
  }
  return { frame, width, height, pixels };
}
