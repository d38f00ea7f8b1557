/** Pixels of one region as linear indices into a `width` x `height` plane, in raster order. */
export type PixelRegion = {
  frame: number;
  width: number;
  height: number;
  pixels: number[];
};
