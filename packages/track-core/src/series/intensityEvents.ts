import { IntensityEventParams, parseIntensityEventParams } from "../config";
import { median } from "../geometry/moments";
import { TrackMatrix, columnSeries } from "../resample/pivotTracks";

export type IntensityEventKind = "drop" | "rise";

/**
 * A run of consecutive observed frames whose intensity sits below (drop) or above
 * (rise) the track's baseline by more than the configured fraction.
 */
export type IntensityEvent = {
  trackId: number;
  channel: number;
  kind: IntensityEventKind;
  startFrame: number;
  endFrame: number;
  baseline: number;
  /** Lowest ratio to baseline for a drop, highest for a rise. */
  extremeRatio: number;
};

type OpenRun = {
  kind: IntensityEventKind;
  startFrame: number;
  endFrame: number;
  extremeRatio: number;
};

export function findIntensityEvents(
  matrix: TrackMatrix,
  params: Partial<IntensityEventParams> = {}
): IntensityEvent[] {
  const config = parseIntensityEventParams(params);
  const events: IntensityEvent[] = [];

  matrix.columns.forEach((column, columnIndex) => {
    const series = columnSeries(matrix, columnIndex).map((value) =>
      value === null || value === matrix.missingValue ? null : value
    );
    const observedAt = series.flatMap((value, index) => (value === null ? [] : [index]));
    if (observedAt.length <= config.baselineFrames) {
      return;
    }

    const baselineWindow = observedAt.slice(0, config.baselineFrames);
    const baseline = median(baselineWindow.map((index) => series[index] ?? 0));
    if (!(baseline > 0)) {
      return;
    }

    let run: OpenRun | null = null;
    const close = () => {
      if (run && run.endFrame - run.startFrame + 1 >= config.minRunLength) {
        events.push({ trackId: column.trackId, channel: column.channel, baseline, ...run });
      }
      run = null;
    };

    const firstScanned = (baselineWindow[baselineWindow.length - 1] ?? 0) + 1;
    for (let index = firstScanned; index < series.length; index += 1) {
      const value = series[index];
      const frame = matrix.frames[index] ?? index + 1;
      if (value === null || value === undefined) {
        close();
        continue;
      }

      const ratio = value / baseline;
      const kind = classify(ratio, config);
      if (kind === null) {
        close();
        continue;
      }
      if (run && run.kind === kind && run.endFrame === frame - 1) {
        run.endFrame = frame;
        run.extremeRatio =
          kind === "drop" ? Math.min(run.extremeRatio, ratio) : Math.max(run.extremeRatio, ratio);
        continue;
      }
      close();
      run = { kind, startFrame: frame, endFrame: frame, extremeRatio: ratio };
    }
    close();
  });

  return events;
}

function classify(ratio: number, config: IntensityEventParams): IntensityEventKind | null {
  if (ratio < 1 - config.dropFraction) {
    return "drop";
  }
  if (ratio > 1 + config.riseFraction) {
    return "rise";
  }
  return null;
}
