/**
 * Monte Carlo Race Simulator
 *
 * One call to simulateRace() produces one race: for every entity and lap a
 * lap time is drawn around the profile's degradation line, pit laps add a
 * pit-loss draw, and running positions come from cumulative time.
 *
 * Draw order is fixed (generated strategies first, in roster order, then laps
 * entity by entity), so a seed fully determines the output.
 */

import type {
  LapProfile,
  PitPolicy,
  SimulatedLap,
  SimulatedTrajectory,
  StrategyPlan,
} from "../../../../shared/types.js";
import { InvalidConfigurationError } from "../errors.js";
import { SeededRandom } from "./random.js";

export interface RaceConfig {
  profile: LapProfile;
  /** Roster; E = entities.length */
  entities: string[];
  raceLength: number;
  seed: number;
  /** Supplied plans; entities without one get a generated plan */
  strategies?: StrategyPlan[];
  pitPolicy?: PitPolicy;
  /** Lower clip applied to every drawn lap time */
  lapTimeFloor?: number;
}

export const DEFAULT_PIT_POLICY: PitPolicy = { minStops: 1, maxStops: 2 };

// ─── Validation ──────────────────────────────────────────────────────────────

export function validateRaceConfig(config: RaceConfig): void {
  const { raceLength, entities } = config;

  if (!Number.isInteger(raceLength) || raceLength < 1) {
    throw new InvalidConfigurationError(
      `Race length must be a positive integer (got ${raceLength})`,
      "raceLength",
      { value: raceLength }
    );
  }
  if (entities.length < 1) {
    throw new InvalidConfigurationError(
      "At least one entity is required",
      "entities",
      { count: 0 }
    );
  }

  const roster = new Set<string>();
  for (const id of entities) {
    if (roster.has(id)) {
      throw new InvalidConfigurationError(
        `Duplicate entity "${id}" in roster`,
        "entities",
        { entityId: id }
      );
    }
    roster.add(id);
  }

  const policy = config.pitPolicy ?? DEFAULT_PIT_POLICY;
  if (
    !Number.isInteger(policy.minStops) ||
    !Number.isInteger(policy.maxStops) ||
    policy.minStops < 0 ||
    policy.minStops > policy.maxStops
  ) {
    throw new InvalidConfigurationError(
      `Pit policy bounds are invalid (${policy.minStops}..${policy.maxStops})`,
      "pitPolicy",
      { minStops: policy.minStops, maxStops: policy.maxStops }
    );
  }

  const planned = new Set<string>();
  for (const plan of config.strategies ?? []) {
    if (!roster.has(plan.entityId)) {
      throw new InvalidConfigurationError(
        `Strategy given for unknown entity "${plan.entityId}"`,
        "strategies",
        { entityId: plan.entityId }
      );
    }
    if (planned.has(plan.entityId)) {
      throw new InvalidConfigurationError(
        `More than one strategy for entity "${plan.entityId}"`,
        "strategies",
        { entityId: plan.entityId }
      );
    }
    planned.add(plan.entityId);

    let prev = 0;
    for (const lap of plan.pitLaps) {
      if (!Number.isInteger(lap) || lap < 1 || lap > raceLength) {
        throw new InvalidConfigurationError(
          `Pit lap ${lap} for entity "${plan.entityId}" is outside [1, ${raceLength}]`,
          "strategies",
          { entityId: plan.entityId, lap }
        );
      }
      if (lap <= prev) {
        throw new InvalidConfigurationError(
          `Pit laps for entity "${plan.entityId}" must be strictly increasing`,
          "strategies",
          { entityId: plan.entityId, lap }
        );
      }
      prev = lap;
    }
  }
}

// ─── Strategy generation ─────────────────────────────────────────────────────

/**
 * Random plan: stop count uniform in [minStops, maxStops], laps drawn without
 * replacement from [2, L-1]. Races shorter than 3 laps have no eligible laps.
 */
export function generateStrategy(
  entityId: string,
  raceLength: number,
  policy: PitPolicy,
  rng: SeededRandom
): StrategyPlan {
  const eligible: number[] = [];
  for (let l = 2; l <= raceLength - 1; l++) eligible.push(l);

  const stops = Math.min(rng.int(policy.minStops, policy.maxStops), eligible.length);
  const pitLaps = rng.sample(eligible, stops).sort((a, b) => a - b);
  return { entityId, pitLaps };
}

// ─── Main entry point ────────────────────────────────────────────────────────

export function simulateRace(config: RaceConfig): SimulatedTrajectory {
  validateRaceConfig(config);

  const { profile, entities, raceLength, seed } = config;
  const policy = config.pitPolicy ?? DEFAULT_PIT_POLICY;
  const floor = config.lapTimeFloor ?? 0;
  const rng = new SeededRandom(seed);

  // ── Strategies ──────────────────────────────────────────────────
  const supplied = new Map<string, StrategyPlan>();
  for (const plan of config.strategies ?? []) supplied.set(plan.entityId, plan);

  const pitLapsOf = new Map<string, number[]>();
  for (const id of entities) {
    const plan = supplied.get(id) ?? generateStrategy(id, raceLength, policy, rng);
    pitLapsOf.set(id, plan.pitLaps.slice());
  }

  // ── Lap draws ───────────────────────────────────────────────────
  const lapTimes = new Map<string, number[]>();
  const cumulative = new Map<string, number[]>();

  for (const id of entities) {
    const pitSet = new Set(pitLapsOf.get(id));
    const times: number[] = [];
    const cum: number[] = [];
    let total = 0;

    for (let lap = 1; lap <= raceLength; lap++) {
      const expected =
        profile.baselineDuration + profile.degradationPerLap * lap;
      let t = Math.max(floor, rng.normal(expected, profile.durationStddev));
      if (pitSet.has(lap)) {
        t += Math.max(0, rng.normal(profile.pitLossMean, profile.pitLossStddev));
      }
      total += t;
      times.push(t);
      cum.push(total);
    }
    lapTimes.set(id, times);
    cumulative.set(id, cum);
  }

  // ── Positions ───────────────────────────────────────────────────
  const positions = new Map<string, number[]>();
  for (const id of entities) positions.set(id, []);

  let finishingOrder: string[] = [];
  for (let i = 0; i < raceLength; i++) {
    const order = rankByCumulativeTime(entities, (id) => cumulative.get(id)?.[i] ?? 0);
    order.forEach((id, rank) => positions.get(id)?.push(rank + 1));
    if (i === raceLength - 1) finishingOrder = order;
  }

  // ── Assemble ────────────────────────────────────────────────────
  const result: SimulatedTrajectory["entities"] = {};
  for (const id of entities) {
    const times = lapTimes.get(id) ?? [];
    const cum = cumulative.get(id) ?? [];
    const pos = positions.get(id) ?? [];
    const pitSet = new Set(pitLapsOf.get(id));

    const laps: SimulatedLap[] = times.map((lapTime, i) => ({
      lap: i + 1,
      lapTime,
      cumulativeTime: cum[i],
      position: pos[i],
      pit: pitSet.has(i + 1),
    }));
    result[id] = { pitLaps: pitLapsOf.get(id) ?? [], laps };
  }

  return { seed, raceLength, entities: result, finishingOrder };
}

/**
 * Order entities by cumulative time ascending. Exact ties are broken by entity
 * id (code point order) so the ranking is a total order.
 */
export function rankByCumulativeTime(
  entities: readonly string[],
  timeOf: (id: string) => number
): string[] {
  return entities.slice().sort((a, b) => {
    const diff = timeOf(a) - timeOf(b);
    if (diff !== 0) return diff;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}
