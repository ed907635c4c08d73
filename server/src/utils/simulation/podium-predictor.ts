import type {
  PodiumEntry,
  PodiumPrediction,
  SimulatedTrajectory,
} from "../../../../shared/types.js";
import { InvalidConfigurationError } from "../errors.js";

/** Below this many runs the frequencies are too noisy to read much into. */
export const RECOMMENDED_ENSEMBLE_SIZE = 100;

/**
 * Running tally of finishing positions. Feed it runs one at a time with
 * add(); only the counts are kept, never the trajectories.
 *
 * positionCounts[p - 1] is the number of runs in which the entity finished
 * P{p}; every entity's counts sum to the number of runs, as do the counts of
 * every position across entities. The roster is fixed by the first run.
 */
export class PodiumAccumulator {
  private roster: string[] = [];
  private counts = new Map<string, number[]>();
  private runs = 0;

  add(run: SimulatedTrajectory): void {
    const runIdx = this.runs;
    if (runIdx === 0) {
      this.roster = Object.keys(run.entities).sort();
      for (const id of this.roster) {
        this.counts.set(id, new Array<number>(this.roster.length).fill(0));
      }
    }

    const e = this.roster.length;
    const order = run.finishingOrder;
    if (order.length !== e || Object.keys(run.entities).length !== e) {
      throw new InvalidConfigurationError(
        `Run ${runIdx} has ${order.length} finishers, expected ${e}`,
        "ensemble",
        { run: runIdx }
      );
    }
    // Check the whole run before counting so a bad run leaves the tally intact
    const rows = order.map((id) => {
      const row = this.counts.get(id);
      if (!row) {
        throw new InvalidConfigurationError(
          `Run ${runIdx} contains entity "${id}" missing from the first run`,
          "ensemble",
          { run: runIdx, entityId: id }
        );
      }
      return row;
    });
    rows.forEach((row, idx) => row[idx]++);
    this.runs++;
  }

  result(): PodiumPrediction {
    const n = this.runs;
    if (n < 1) {
      throw new InvalidConfigurationError(
        "Podium prediction needs at least one simulated race",
        "ensemble",
        { runs: 0 }
      );
    }

    const entries: PodiumEntry[] = this.roster.map((entityId) => {
      const positionCounts = (this.counts.get(entityId) ?? []).slice();
      const positionProbabilities = positionCounts.map((c) => c / n);
      const podiumProbability = positionProbabilities
        .slice(0, 3)
        .reduce((s, p) => s + p, 0);
      const expectedPosition =
        positionCounts.reduce((s, c, idx) => s + c * (idx + 1), 0) / n;

      return {
        entityId,
        positionCounts,
        positionProbabilities,
        winProbability: positionProbabilities[0] ?? 0,
        podiumProbability,
        expectedPosition,
      };
    });

    entries.sort(
      (a, b) =>
        b.podiumProbability - a.podiumProbability ||
        a.expectedPosition - b.expectedPosition ||
        (a.entityId < b.entityId ? -1 : 1)
    );

    return {
      runs: n,
      stable: n >= RECOMMENDED_ENSEMBLE_SIZE,
      entities: entries,
    };
  }
}

/**
 * Aggregate an ensemble into per-entity finishing-position frequencies.
 * No resampling happens here: callers that want stable numbers supply at
 * least RECOMMENDED_ENSEMBLE_SIZE runs.
 */
export function predictPodium(
  ensemble: readonly SimulatedTrajectory[]
): PodiumPrediction {
  const tally = new PodiumAccumulator();
  for (const run of ensemble) tally.add(run);
  return tally.result();
}
