import {
  CorrectionSettings,
  DEFAULT_CORRECTION_SETTINGS,
  DEFAULT_INTENSITY_EVENT_PARAMS,
  DEFAULT_LINKAGE_PARAMS,
  DEFAULT_PIVOT_OPTIONS,
  IntensityEventParams,
  LinkageParams,
  PivotOptions,
  correctionSettingsSchema,
  intensityEventParamsSchema,
  linkageParamsSchema,
  parseConfig,
  pivotOptionsSchema
} from "@nuctrack/track-core";
import { z } from "zod";

export const sessionSettingsSchema = z.object({
  detectionChannel: z.number().int().min(1),
  linkage: linkageParamsSchema,
  correction: correctionSettingsSchema,
  pivot: pivotOptionsSchema,
  events: intensityEventParamsSchema
});

export type SessionSettings = z.infer<typeof sessionSettingsSchema>;

export type SessionSettingsInput = {
  detectionChannel?: number;
  linkage?: Partial<LinkageParams>;
  correction?: Partial<CorrectionSettings>;
  pivot?: Partial<PivotOptions>;
  events?: Partial<IntensityEventParams>;
};

export const DEFAULT_SESSION_SETTINGS: SessionSettings = {
  detectionChannel: 1,
  linkage: DEFAULT_LINKAGE_PARAMS,
  correction: DEFAULT_CORRECTION_SETTINGS,
  pivot: DEFAULT_PIVOT_OPTIONS,
  events: DEFAULT_INTENSITY_EVENT_PARAMS
};

export function parseSessionSettings(input: SessionSettingsInput = {}): SessionSettings {
  return parseConfig(
    sessionSettingsSchema,
    {
      detectionChannel: input.detectionChannel ?? DEFAULT_SESSION_SETTINGS.detectionChannel,
      linkage: { ...DEFAULT_SESSION_SETTINGS.linkage, ...input.linkage },
      correction: { ...DEFAULT_SESSION_SETTINGS.correction, ...input.correction },
      pivot: { ...DEFAULT_SESSION_SETTINGS.pivot, ...input.pivot },
      events: { ...DEFAULT_SESSION_SETTINGS.events, ...input.events }
    },
    "session"
  );
}
