import { parseConfig, separationParamsSchema } from "@nuctrack/track-core";
import { z } from "zod";

export const thresholdDetectorParamsSchema = z.object({
  /** Fixed foreground threshold; null picks one per frame with Otsu's method. */
  threshold: z.number().finite().nullable(),
  minArea: z.number().nonnegative(),
  /** Conditional separation of touching objects; null skips it. */
  separation: separationParamsSchema.partial().nullable()
});

export type ThresholdDetectorParams = z.infer<typeof thresholdDetectorParamsSchema>;

export const DEFAULT_THRESHOLD_DETECTOR_PARAMS: ThresholdDetectorParams = {
  threshold: null,
  minArea: 20,
  separation: null
};

export function parseThresholdDetectorParams(
  overrides: Partial<ThresholdDetectorParams> = {}
): ThresholdDetectorParams {
  return parseConfig(
    thresholdDetectorParamsSchema,
    { ...DEFAULT_THRESHOLD_DETECTOR_PARAMS, ...overrides },
    "detector"
  );
}
