export class TrackingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The registry and the region store disagree; index correlation can no longer be trusted. */
export class ConsistencyError extends TrackingError {
  readonly detections: number;
  readonly regions: number;

  constructor(detections: number, regions: number) {
    super(`Registry holds ${detections} detections but the region store holds ${regions}`);
    this.detections = detections;
    this.regions = regions;
  }
}

export class EmptyStateError extends TrackingError {
  readonly action: string;

  constructor(action: string) {
    super(`Cannot ${action}: there are no detections`);
    this.action = action;
  }
}

export class ConfigError extends TrackingError {
  readonly issues: string[];

  constructor(section: string, issues: string[]) {
    super(`Invalid ${section} configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
