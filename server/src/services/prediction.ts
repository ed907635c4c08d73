import type {
  LapProfile,
  PodiumPrediction,
  ProfileBuildReport,
  SimulatedTrajectory,
} from "../../../shared/types.js";
import { InsufficientDataError, InvalidConfigurationError } from "../utils/errors.js";
import type { PredictBody, SimulateBody } from "../utils/validators.js";
import {
  DEFAULT_LAP_PROFILE,
  buildLapProfile,
  type LapProfileOptions,
  type LapProfileResult,
} from "../utils/simulation/lap-profile.js";
import { simulateRace, type RaceConfig } from "../utils/simulation/race-simulator.js";
import { streamEnsemble } from "../utils/simulation/ensemble.js";
import { PodiumAccumulator } from "../utils/simulation/podium-predictor.js";
import type { ServiceContext } from "./context.js";

export interface ProfileParams {
  minValidLaps?: number;
  maxMedianMultiple?: number;
  minLapDuration?: number;
}

export interface ResolvedProfile {
  profile: LapProfile;
  source: "history" | "default";
  report: ProfileBuildReport | null;
}

// ─── Profile ─────────────────────────────────────────────────────────────────

export function getProfile(
  ctx: ServiceContext,
  venueKey: string,
  params: ProfileParams = {}
): Promise<LapProfileResult> {
  const options: Required<Omit<LapProfileOptions, "fallbackPitLoss">> = {
    minValidLaps: params.minValidLaps ?? ctx.settings.minValidLaps,
    maxMedianMultiple: params.maxMedianMultiple ?? ctx.settings.maxMedianMultiple,
    minLapDuration: params.minLapDuration ?? ctx.settings.minLapDuration,
  };
  const key = [
    venueKey,
    options.minValidLaps,
    options.maxMedianMultiple,
    options.minLapDuration,
  ].join(":");

  return ctx.cache.profiles.get(key, async () => {
    const history = await ctx.source.getLapHistory(venueKey);
    return buildLapProfile(history, options);
  });
}

/**
 * Profile for a simulation request. With `fallbackToDefault`, a venue without
 * enough clean laps gets the generic profile instead of an error.
 */
export async function resolveProfile(
  ctx: ServiceContext,
  venueKey: string,
  fallbackToDefault: boolean
): Promise<ResolvedProfile> {
  try {
    const { profile, report } = await getProfile(ctx, venueKey);
    return { profile, source: "history", report };
  } catch (err) {
    if (fallbackToDefault && err instanceof InsufficientDataError) {
      return { profile: DEFAULT_LAP_PROFILE, source: "default", report: null };
    }
    throw err;
  }
}

// ─── Simulation ──────────────────────────────────────────────────────────────

function raceConfig(
  ctx: ServiceContext,
  profile: LapProfile,
  body: SimulateBody
): Omit<RaceConfig, "seed"> {
  const raceLength = body.raceLength ?? ctx.settings.defaultRaceLength;
  if (raceLength > ctx.settings.maxRaceLength) {
    throw new InvalidConfigurationError(
      `Race length ${raceLength} exceeds the limit of ${ctx.settings.maxRaceLength}`,
      "raceLength",
      { value: raceLength, max: ctx.settings.maxRaceLength }
    );
  }
  return {
    profile,
    entities: body.entities,
    raceLength,
    strategies: body.strategies,
    pitPolicy: body.pitPolicy ?? ctx.settings.pitPolicy,
    lapTimeFloor: body.lapTimeFloor,
  };
}

function randomSeed(): number {
  return Math.floor(Math.random() * 2 ** 31);
}

export async function simulate(
  ctx: ServiceContext,
  venueKey: string,
  body: SimulateBody
): Promise<{ venueKey: string; profileSource: ResolvedProfile["source"]; trajectory: SimulatedTrajectory }> {
  const resolved = await resolveProfile(ctx, venueKey, body.fallbackToDefault);
  const config = raceConfig(ctx, resolved.profile, body);
  const trajectory = simulateRace({
    ...config,
    seed: body.seed ?? randomSeed(),
  });
  return { venueKey, profileSource: resolved.source, trajectory };
}

export async function predict(
  ctx: ServiceContext,
  venueKey: string,
  body: PredictBody,
  signal?: AbortSignal
): Promise<{ venueKey: string; profileSource: ResolvedProfile["source"]; baseSeed: number; prediction: PodiumPrediction }> {
  if (body.runs > ctx.settings.maxEnsembleRuns) {
    throw new InvalidConfigurationError(
      `Ensemble size ${body.runs} exceeds the limit of ${ctx.settings.maxEnsembleRuns}`,
      "runs",
      { value: body.runs, max: ctx.settings.maxEnsembleRuns }
    );
  }

  const resolved = await resolveProfile(ctx, venueKey, body.fallbackToDefault);
  const config = raceConfig(ctx, resolved.profile, body);
  const baseSeed = body.seed ?? randomSeed();

  // Runs are tallied as they finish and then dropped
  const tally = new PodiumAccumulator();
  await streamEnsemble(config, { runs: body.runs, baseSeed, signal }, (run) =>
    tally.add(run)
  );

  return {
    venueKey,
    profileSource: resolved.source,
    baseSeed,
    prediction: tally.result(),
  };
}
