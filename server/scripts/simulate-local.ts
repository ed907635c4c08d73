/**
 * Build a lap profile from a local lap-history export and print podium odds.
 * Usage: npx tsx server/scripts/simulate-local.ts [laps.json] [runs] [raceLength]
 *
 * Without a file, synthetic history is used.
 */
import { readFileSync } from "fs";
import { resolve } from "path";
import type { LapRecord } from "../../shared/types.js";
import { lapHistorySchema } from "../src/utils/validators.js";
import { buildLapProfile } from "../src/utils/simulation/lap-profile.js";
import { streamEnsemble } from "../src/utils/simulation/ensemble.js";
import { PodiumAccumulator } from "../src/utils/simulation/podium-predictor.js";
import { generateLapHistory } from "../src/services/data-sources/synthetic.js";
import { isSimulationError } from "../src/utils/errors.js";

async function main() {
  const [file, runsArg, lengthArg] = process.argv.slice(2);
  const runs = Number(runsArg ?? 500);
  const raceLength = Number(lengthArg ?? 56);

  let history: LapRecord[];
  if (file) {
    const path = resolve(file);
    history = lapHistorySchema.parse(JSON.parse(readFileSync(path, "utf-8")));
    console.log(`  Loaded: ${path} (${history.length} lap records)`);
  } else {
    history = generateLapHistory(2024);
    console.log(`  No file given, using ${history.length} synthetic lap records`);
  }

  // ── Profile ──────────────────────────────────────────────────────
  const { profile, report } = buildLapProfile(history);
  const { dropped } = report;
  console.log(
    `  Profile: baseline ${profile.baselineDuration.toFixed(3)}s, ` +
      `degradation ${profile.degradationPerLap.toFixed(4)}s/lap, ` +
      `σ ${profile.durationStddev.toFixed(3)}s, ` +
      `pit loss ${profile.pitLossMean.toFixed(2)}±${profile.pitLossStddev.toFixed(2)}s`
  );
  console.log(
    `  Kept ${report.keptLaps} clean + ${report.pitLaps} pit laps; dropped ` +
      `${dropped.invalid} invalid, ${dropped.nonMonotonic} out of order, ` +
      `${dropped.belowMinimum} too short, ${dropped.aboveMedianMultiple} too long`
  );
  if (!report.pitLossEstimated) {
    console.log("  WARN: no pit laps in history, using fallback pit loss");
  }

  // ── Ensemble ─────────────────────────────────────────────────────
  const entities = [...new Set(history.map((r) => r.entityId))];
  console.log(`  Simulating ${runs} races of ${raceLength} laps, ${entities.length} entities...`);
  const started = Date.now();
  const tally = new PodiumAccumulator();
  await streamEnsemble({ profile, entities, raceLength }, { runs, baseSeed: 1 }, (run) =>
    tally.add(run)
  );
  const prediction = tally.result();
  console.log(`  Done in ${Date.now() - started}ms${prediction.stable ? "" : " (few runs, odds are noisy)"}`);

  console.log("\n  Entity   Win%   Podium%   Avg pos");
  for (const e of prediction.entities) {
    console.log(
      `  ${e.entityId.padEnd(8)} ${(e.winProbability * 100).toFixed(1).padStart(5)}` +
        `   ${(e.podiumProbability * 100).toFixed(1).padStart(6)}` +
        `   ${e.expectedPosition.toFixed(2).padStart(7)}`
    );
  }
}

main().catch((err) => {
  if (isSimulationError(err)) {
    console.error(`Fatal: ${err.name} (${err.code}):`, err.message, err.details);
  } else {
    console.error("Fatal:", err);
  }
  process.exit(1);
});
