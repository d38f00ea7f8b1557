export type ImagePlane = {
  width: number;
  height: number;
  data: ArrayLike<number>;
};

export type BinaryMask = {
  width: number;
  height: number;
  data: Uint8Array;
};

/** Frames and channels are both 1-based. */
export type ImageStack = {
  width: number;
  height: number;
  frames: number;
  channels: number;
  plane(frame: number, channel: number): ImagePlane;
};

export function createImageStack(
  width: number,
  height: number,
  planes: ArrayLike<number>[][]
): ImageStack {
  const channels = planes[0]?.length ?? 0;
  for (const [index, frame] of planes.entries()) {
    if (frame.length !== channels) {
      throw new Error(`Frame ${index + 1} has ${frame.length} channels, expected ${channels}`);
    }
    for (const data of frame) {
      if (data.length !== width * height) {
        throw new Error(`Frame ${index + 1} plane does not match ${width}x${height}`);
      }
    }
  }

  return {
    width,
    height,
    frames: planes.length,
    channels,
    plane(frame, channel) {
      const data = planes[frame - 1]?.[channel - 1];
      if (!data) {
        throw new RangeError(`No plane for frame ${frame}, channel ${channel}`);
      }
      return { width, height, data };
    }
  };
}

export function createMask(width: number, height: number): BinaryMask {
  return { width, height, data: new Uint8Array(width * height) };
}

export function cloneMask(mask: BinaryMask): BinaryMask {
  return { width: mask.width, height: mask.height, data: Uint8Array.from(mask.data) };
}
