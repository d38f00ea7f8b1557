import { z } from "zod";

import { ConfigError } from "./errors";

export const trackIdSchema = z.number().int().min(1);

export const linkageParamsSchema = z.object({
  maxDisplacement: z.number().finite().nonnegative(),
  gap: z.number().int().min(1)
});

export type LinkageParams = z.infer<typeof linkageParamsSchema>;

export const DEFAULT_LINKAGE_PARAMS: LinkageParams = {
  maxDisplacement: 20,
  gap: 2
};

export const separationParamsSchema = z.object({
  separate: z.number().min(0).max(1),
  maxBoundaryRatio: z.number().positive(),
  splitTolerance: z.number().nonnegative()
});

export type SeparationParams = z.infer<typeof separationParamsSchema>;

export const DEFAULT_SEPARATION_PARAMS: SeparationParams = {
  separate: 0.5,
  maxBoundaryRatio: 0.35,
  splitTolerance: 0.5
};

export const correctionExtentSchema = z.enum([
  "this-frame",
  "all-frames",
  "all-previous",
  "all-following"
]);

export const correctionSettingsSchema = z.object({
  extent: correctionExtentSchema,
  relabelTrackId: trackIdSchema.optional()
});

export type CorrectionSettings = z.infer<typeof correctionSettingsSchema>;

export const DEFAULT_CORRECTION_SETTINGS: CorrectionSettings = {
  extent: "this-frame"
};

export const pivotOptionsSchema = z.object({
  missingValue: z.number().finite().nullable()
});

export type PivotOptions = z.infer<typeof pivotOptionsSchema>;

export const DEFAULT_PIVOT_OPTIONS: PivotOptions = {
  missingValue: null
};

export const intensityEventParamsSchema = z.object({
  baselineFrames: z.number().int().min(1),
  dropFraction: z.number().gt(0).lt(1),
  riseFraction: z.number().positive(),
  minRunLength: z.number().int().min(1)
});

export type IntensityEventParams = z.infer<typeof intensityEventParamsSchema>;

export const DEFAULT_INTENSITY_EVENT_PARAMS: IntensityEventParams = {
  baselineFrames: 3,
  dropFraction: 0.3,
  riseFraction: 0.3,
  minRunLength: 1
};

export function parseConfig<T>(schema: z.ZodType<T>, input: unknown, section: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      section,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

export function parseLinkageParams(overrides: Partial<LinkageParams> = {}): LinkageParams {
  return parseConfig(linkageParamsSchema, { ...DEFAULT_LINKAGE_PARAMS, ...overrides }, "linkage");
}

export function parseSeparationParams(overrides: Partial<SeparationParams> = {}): SeparationParams {
  return parseConfig(
    separationParamsSchema,
    { ...DEFAULT_SEPARATION_PARAMS, ...overrides },
    "separation"
  );
}

export function parseCorrectionSettings(
  overrides: Partial<CorrectionSettings> = {}
): CorrectionSettings {
  return parseConfig(
    correctionSettingsSchema,
    { ...DEFAULT_CORRECTION_SETTINGS, ...overrides },
    "correction"
  );
}

export function parsePivotOptions(overrides: Partial<PivotOptions> = {}): PivotOptions {
  return parseConfig(pivotOptionsSchema, { ...DEFAULT_PIVOT_OPTIONS, ...overrides }, "pivot");
}

export function parseIntensityEventParams(
  overrides: Partial<IntensityEventParams> = {}
): IntensityEventParams {
  return parseConfig(
    intensityEventParamsSchema,
    { ...DEFAULT_INTENSITY_EVENT_PARAMS, ...overrides },
    "intensity event"
  );
}
