import {
  ConfigError,
  ConsistencyError,
  CorrectionEventDTO,
  CorrectionExtent,
  CorrectionOutput,
  CorrectionState,
  DetectionRegistry,
  DetectorPort,
  EmptyStateError,
  FramedRegion,
  ImageStack,
  IntensityEvent,
  LinkageStats,
  LinkageStrategy,
  Logger,
  MeasurementPort,
  RegionStore,
  ResampleSummary,
  TrackMatrix,
  TrackingError,
  findIntensityEvents,
  linkTracks,
  parseConfig,
  pivotTracks,
  reduceCorrection,
  resampleChannels,
  trackIdSchema
} from "@nuctrack/track-core";

import { SessionSettings, SessionSettingsInput, parseSessionSettings } from "./config";

export type AnalysisSessionOptions<G extends FramedRegion> = {
  detector: DetectorPort<G>;
  measurer: MeasurementPort<G>;
  regionStore?: RegionStore<G>;
  strategy?: LinkageStrategy;
  logger?: Logger;
  settings?: SessionSettingsInput;
};

export type DetectionSummary = {
  frames: number;
  detections: number;
};

export type OperatorCommand = "detect" | "link" | "resample" | "pivot" | "events" | "reset";

export type SessionReport =
  | { command: "detect"; summary: DetectionSummary }
  | { command: "link"; stats: LinkageStats }
  | { command: "resample"; summary: ResampleSummary | null }
  | { command: "pivot"; matrix: TrackMatrix | null }
  | { command: "events"; events: IntensityEvent[] }
  | { command: "reset" };

/**
 * One analysis of one image stack. Owns the registry every pass reads and writes, and
 * turns operator commands and cursor events into calls on the core.
 */
export class AnalysisSession<G extends FramedRegion> {
  readonly registry: DetectionRegistry<G>;
  private readonly stack: ImageStack;
  private readonly detector: DetectorPort<G>;
  private readonly measurer: MeasurementPort<G>;
  private readonly strategy: LinkageStrategy | undefined;
  private readonly logger: Logger;
  private settings: SessionSettings;
  private correctionState: CorrectionState = { status: "idle" };

  constructor(stack: ImageStack, options: AnalysisSessionOptions<G>) {
    this.settings = parseSessionSettings(options.settings);
    if (this.settings.detectionChannel > stack.channels) {
      throw new ConfigError("session", [
        `detectionChannel: stack has ${stack.channels} channels, asked for ${this.settings.detectionChannel}`
      ]);
    }
    this.stack = stack;
    this.detector = options.detector;
    this.measurer = options.measurer;
    this.strategy = options.strategy;
    this.logger = options.logger ?? console;
    this.registry = new DetectionRegistry<G>(options.regionStore);
  }

  get state(): CorrectionState {
    return this.correctionState;
  }

  setExtent(extent: CorrectionExtent): void {
    this.settings = { ...this.settings, correction: { ...this.settings.correction, extent } };
  }

  setRelabelTrackId(trackId: number): void {
    const relabelTrackId = parseConfig(trackIdSchema, trackId, "correction");
    this.settings = {
      ...this.settings,
      correction: { ...this.settings.correction, relabelTrackId }
    };
  }

  dispatch(command: OperatorCommand): SessionReport {
    switch (command) {
      case "detect":
        return { command, summary: this.detect() };
      case "link":
        return { command, stats: this.link() };
      case "resample":
        return { command, summary: this.resample() };
      case "pivot":
        return { command, matrix: this.pivot() };
      case "events":
        return { command, events: this.events() };
      case "reset":
        this.reset();
        return { command };
    }
  }

  /** Full detection pass over every frame; replaces whatever the registry held. */
  detect(): DetectionSummary {
    this.reset();
    return this.guarded("detection", () => {
      const channel = this.settings.detectionChannel;
      for (let frame = 1; frame <= this.stack.frames; frame += 1) {
        const plane = this.stack.plane(frame, channel);
        for (const region of this.detector.detect(plane, frame)) {
          if (region.frame !== frame) {
            throw new TrackingError(`Detector placed a frame ${frame} region in frame ${region.frame}`);
          }
          const measurement = this.measurer.measure(region, plane);
          this.registry.append(
            {
              frame,
              centroid: measurement.centroid,
              area: measurement.area,
              shape: measurement.shape
            },
            region
          );
        }
      }
      const summary = { frames: this.stack.frames, detections: this.registry.count() };
      this.logger.info(
        `[Session] Detected ${summary.detections} nuclei across ${summary.frames} frames`
      );
      return summary;
    });
  }

  link(): LinkageStats {
    return this.guarded("linkage", () => {
      const stats = linkTracks(this.registry, this.settings.linkage, this.strategy);
      this.correctionState = { status: "idle" };
      this.logger.info(
        `[Session] Linked ${stats.links + stats.relinks} detections into ${stats.tracks} tracks`
      );
      return stats;
    });
  }

  handleCursor(event: CorrectionEventDTO): CorrectionOutput | null {
    if (
      event.type === "CURSOR" &&
      !(Number.isInteger(event.frame) && event.frame >= 1 && event.frame <= this.stack.frames)
    ) {
      this.logger.warn(`[Session] Cursor frame ${event.frame} is outside 1..${this.stack.frames}`);
      return { state: this.correctionState, outcome: { ok: false, reason: "frame-out-of-range" } };
    }
    return this.tolerateEmpty("correction", () => {
      const output = reduceCorrection(
        this.correctionState,
        event,
        this.registry,
        this.settings.correction
      );
      this.correctionState = output.state;
      if (output.outcome && !output.outcome.ok) {
        this.logger.warn(`[Session] Correction skipped: ${output.outcome.reason}`);
      } else if (output.outcome) {
        this.logger.info(`[Session] Applied ${output.outcome.kind} to track ${output.outcome.trackId}`);
      }
      return output;
    });
  }

  resample(): ResampleSummary | null {
    return this.tolerateEmpty("resampling", () => {
      const summary = resampleChannels(this.registry, this.stack, this.measurer);
      this.logger.info(
        `[Session] Resampled ${summary.rows} detections over ${summary.channels} channels`
      );
      return summary;
    });
  }

  pivot(): TrackMatrix | null {
    return this.tolerateEmpty("pivot", () => {
      const matrix = pivotTracks(this.registry, this.settings.pivot);
      if (matrix.overwritten > 0) {
        this.logger.warn(
          `[Session] ${matrix.overwritten} detections share a track and frame with a later one`
        );
      }
      return matrix;
    });
  }

  events(): IntensityEvent[] {
    const matrix = this.pivot();
    if (!matrix) {
      return [];
    }
    const events = findIntensityEvents(matrix, this.settings.events);
    this.logger.info(`[Session] Found ${events.length} intensity events`);
    return events;
  }

  reset(): void {
    this.registry.reset();
    this.correctionState = { status: "idle" };
  }

  private tolerateEmpty<T>(phase: string, run: () => T): T | null {
    try {
      return this.guarded(phase, run);
    } catch (error) {
      if (error instanceof EmptyStateError) {
        this.logger.warn(`[Session] ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private guarded<T>(phase: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (error instanceof ConsistencyError) {
        this.logger.error(`[Session] ${phase} aborted: ${error.message}`);
      }
      throw error;
    }
  }
}
