import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { SimulatedTrajectory } from "../../../../shared/types.js";
import { InvalidConfigurationError } from "../errors.js";
import { simulateRace, validateRaceConfig, type RaceConfig } from "./race-simulator.js";

/** Seeds live in the 32-bit state space of SeededRandom */
export const MAX_SEED = 4294967295;

export interface EnsembleOptions {
  runs: number;
  /** Run i uses seed baseSeed + i, wrapped to 32 bits */
  baseSeed: number;
  signal?: AbortSignal;
  /** Yield to the event loop after this many runs (default 25) */
  yieldEvery?: number;
}

function runSeed(baseSeed: number, run: number): number {
  return (baseSeed + run) >>> 0;
}

/**
 * Run `runs` independent simulations of the same configuration and hand each
 * one to `onRun` as soon as it finishes. Nothing is retained here, so callers
 * that only aggregate never hold more than one trajectory.
 *
 * Each run owns its own generator; aborting the signal stops between runs
 * and rejects with the signal's reason.
 */
export async function streamEnsemble(
  config: Omit<RaceConfig, "seed">,
  options: EnsembleOptions,
  onRun: (run: SimulatedTrajectory, index: number) => void
): Promise<void> {
  const { runs, baseSeed, signal } = options;
  const yieldEvery = Math.max(1, options.yieldEvery ?? 25);

  if (!Number.isInteger(runs) || runs < 1) {
    throw new InvalidConfigurationError(
      `Ensemble size must be a positive integer (got ${runs})`,
      "runs",
      { value: runs }
    );
  }
  if (!Number.isInteger(baseSeed) || baseSeed < 0 || baseSeed > MAX_SEED) {
    throw new InvalidConfigurationError(
      `Seed must be an integer in [0, ${MAX_SEED}] (got ${baseSeed})`,
      "seed",
      { value: baseSeed }
    );
  }
  validateRaceConfig({ ...config, seed: baseSeed });

  for (let i = 0; i < runs; i++) {
    signal?.throwIfAborted();
    onRun(simulateRace({ ...config, seed: runSeed(baseSeed, i) }), i);
    if ((i + 1) % yieldEvery === 0 && i + 1 < runs) {
      await yieldToEventLoop();
    }
  }
}

/** Collect every run of an ensemble. Prefer streamEnsemble for large ensembles. */
export async function runEnsemble(
  config: Omit<RaceConfig, "seed">,
  options: EnsembleOptions
): Promise<SimulatedTrajectory[]> {
  const results: SimulatedTrajectory[] = [];
  await streamEnsemble(config, options, (run) => {
    results.push(run);
  });
  return results;
}
