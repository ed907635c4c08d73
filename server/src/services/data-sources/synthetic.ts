import type { LapRecord, SessionTelemetry } from "../../../../shared/types.js";
import { generateSyntheticTelemetry } from "../../utils/replay/synthetic-telemetry.js";
import { SeededRandom } from "../../utils/simulation/random.js";
import type { RaceDataSource } from "./types.js";

export interface SyntheticHistoryOptions {
  sessions?: number;
  entities?: number;
  laps?: number;
}

/**
 * Deterministic demo data for any key: lap history scattered around a 95s
 * lap with light degradation, one or two pit stops per car and the odd
 * invalidated lap, plus circular-track telemetry for replays.
 */
export class SyntheticRaceDataSource implements RaceDataSource {
  readonly id = "synthetic";

  constructor(private readonly history: SyntheticHistoryOptions = {}) {}

  async getLapHistory(venueKey: string): Promise<LapRecord[]> {
    return generateLapHistory(hashKey(venueKey), this.history);
  }

  async getTelemetry(sessionKey: string): Promise<SessionTelemetry> {
    return generateSyntheticTelemetry({ sessionKey });
  }
}

export function generateLapHistory(
  seed: number,
  options: SyntheticHistoryOptions = {}
): LapRecord[] {
  const sessions = options.sessions ?? 3;
  const entities = options.entities ?? 10;
  const laps = options.laps ?? 30;
  const rng = new SeededRandom(seed);
  const records: LapRecord[] = [];

  for (let s = 0; s < sessions; s++) {
    const sessionKey = `S${s + 1}`;
    for (let e = 0; e < entities; e++) {
      const entityId = String(e + 1);
      const pace = rng.normal(0, 0.4); // car-to-car spread
      const stops = rng.sample(rangeInclusive(2, laps - 1), rng.int(1, 2));

      for (let lap = 1; lap <= laps; lap++) {
        const pit = stops.includes(lap);
        let duration = 95 + pace + 0.04 * lap + rng.normal(0, 0.6);
        if (pit) duration += rng.normal(21, 1.5);
        records.push({
          entityId,
          lapNumber: lap,
          lapDuration: duration,
          isValid: rng.next() >= 0.02,
          pitFlag: pit,
          sessionKey,
        });
      }
    }
  }
  return records;
}

/** 32-bit FNV-1a */
export function hashKey(key: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    h ^= key.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function rangeInclusive(from: number, to: number): number[] {
  const out: number[] = [];
  for (let v = from; v <= to; v++) out.push(v);
  return out;
}
