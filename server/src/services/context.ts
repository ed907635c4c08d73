import type { PitPolicy } from "../../../shared/types.js";
import type { Env } from "../config/env.js";
import type { RaceDataCache } from "./cache.js";
import type { RaceDataSource } from "./data-sources/index.js";

export interface CoreSettings {
  defaultSampleRate: number;
  minValidLaps: number;
  maxMedianMultiple: number;
  minLapDuration: number;
  pitPolicy: PitPolicy;
  defaultRaceLength: number;
  maxRaceLength: number;
  maxEnsembleRuns: number;
}

/** Everything a service needs, passed in explicitly rather than imported as globals */
export interface ServiceContext {
  source: RaceDataSource;
  cache: RaceDataCache;
  settings: CoreSettings;
}

export function settingsFromEnv(env: Env): CoreSettings {
  return {
    defaultSampleRate: env.DEFAULT_SAMPLE_RATE,
    minValidLaps: env.MIN_VALID_LAPS,
    maxMedianMultiple: env.MAX_MEDIAN_MULTIPLE,
    minLapDuration: env.MIN_LAP_DURATION,
    pitPolicy: { minStops: env.PIT_STOPS_MIN, maxStops: env.PIT_STOPS_MAX },
    defaultRaceLength: env.DEFAULT_RACE_LENGTH,
    maxRaceLength: env.MAX_RACE_LENGTH,
    maxEnsembleRuns: env.MAX_ENSEMBLE_RUNS,
  };
}
