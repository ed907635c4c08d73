// ─── Historical laps ──────────────────────────────────────────────────────────

export interface LapRecord {
  entityId: string;
  lapNumber: number;
  lapDuration: number; // seconds
  isValid: boolean;
  pitFlag: boolean;
  sessionKey?: string;
}

// ─── Lap profile ──────────────────────────────────────────────────────────────

export interface LapProfile {
  baselineDuration: number;
  degradationPerLap: number;
  durationStddev: number;
  pitLossMean: number;
  pitLossStddev: number;
}

export interface DroppedLapCounts {
  invalid: number;
  nonMonotonic: number;
  belowMinimum: number;
  aboveMedianMultiple: number;
}

export interface ProfileBuildReport {
  totalRecords: number;
  keptLaps: number;
  pitLaps: number;
  dropped: DroppedLapCounts;
  /** false when no pit laps survived filtering and the fallback pit loss was used */
  pitLossEstimated: boolean;
}

/** Response from GET /api/venues/:venueKey/profile */
export interface ProfileResponse {
  venueKey: string;
  profile: LapProfile;
  report: ProfileBuildReport;
}

// ─── Simulation ───────────────────────────────────────────────────────────────

export interface StrategyPlan {
  entityId: string;
  pitLaps: number[];
}

export interface PitPolicy {
  minStops: number;
  maxStops: number;
}

export interface SimulatedLap {
  lap: number;
  lapTime: number;
  cumulativeTime: number;
  position: number;
  pit: boolean;
}

export interface EntityTrajectory {
  pitLaps: number[];
  laps: SimulatedLap[];
}

export interface SimulatedTrajectory {
  seed: number;
  raceLength: number;
  entities: Record<string, EntityTrajectory>;
  finishingOrder: string[];
}

export interface PodiumEntry {
  entityId: string;
  positionCounts: number[];
  positionProbabilities: number[];
  winProbability: number;
  podiumProbability: number;
  expectedPosition: number;
}

export interface PodiumPrediction {
  runs: number;
  /** true once runs reaches the recommended ensemble size */
  stable: boolean;
  entities: PodiumEntry[];
}

// ─── Telemetry ────────────────────────────────────────────────────────────────

export interface RawTelemetrySample {
  index: number;
  time?: number;
  x: number;
  y: number;
  speed: number;
  lapNumber: number;
}

export interface EntityDisplay {
  code: string;
  name: string;
  team: string;
  color: string;
}

export interface EntityTelemetry {
  display: EntityDisplay;
  samples: RawTelemetrySample[];
}

export interface SessionTelemetry {
  sessionKey: string;
  entities: Record<string, EntityTelemetry>;
}

// ─── Frames ───────────────────────────────────────────────────────────────────

export interface PresentEntity extends EntityDisplay {
  kind: "present";
  x: number;
  y: number;
  speed: number;
  lap: number;
}

export interface AbsentEntity {
  kind: "absent";
}

export type FrameEntity = PresentEntity | AbsentEntity;

export interface Frame {
  index: number;
  /** raw sample index this frame was decimated from */
  sampleIndex: number;
  entities: Record<string, FrameEntity>;
}

export interface CoordinateBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface Viewport {
  x: [number, number];
  y: [number, number];
}

export interface FrameSequence {
  sessionKey: string;
  sampleRate: number;
  totalFrames: number;
  rawSampleCount: number;
  bounds: CoordinateBounds;
  viewport: Viewport;
  frames: readonly Frame[];
}

export interface TrackOutline {
  sessionKey: string;
  points: [number, number][];
}

/** Response from GET /api/sessions/:sessionKey/frames */
export interface FramePageResponse {
  sessionKey: string;
  sampleRate: number;
  totalFrames: number;
  offset: number;
  frames: Frame[];
}

// ─── API Responses ────────────────────────────────────────────────────────────

export interface CacheStats {
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
  builds: number;
  failures: number;
}

export interface ApiError {
  error: string;
  code?: string;
  details?: Array<{ field: string; message: string }> | Record<string, unknown>;
}
