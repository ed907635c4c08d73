import type {
  EntityDisplay,
  RawTelemetrySample,
  SessionTelemetry,
} from "../../../../shared/types.js";

export interface SyntheticTelemetryOptions {
  sessionKey?: string;
  entities?: number;
  laps?: number;
  pointsPerLap?: number;
}

// Made-up roster for demo sessions; colours deliberately mix "#"-prefixed and bare hex
const ROSTER: EntityDisplay[] = [
  { code: "ABE", name: "Abel", team: "Apex Racing", color: "#1E41FF" },
  { code: "BRA", name: "Brandt", team: "Northline", color: "DC0000" },
  { code: "CAS", name: "Castillo", team: "Corsa Nove", color: "#00D2BE" },
  { code: "DUF", name: "Dufresne", team: "Apex Racing", color: "1E41FF" },
  { code: "ERI", name: "Eriksen", team: "Northline", color: "#DC0000" },
  { code: "FON", name: "Fontaine", team: "Halcyon GP", color: "FF8700" },
  { code: "GAR", name: "Garber", team: "Corsa Nove", color: "#00D2BE" },
  { code: "HAL", name: "Halloran", team: "Halcyon GP", color: "#FF8700" },
  { code: "IBA", name: "Ibarra", team: "Verdant", color: "006F62" },
  { code: "JES", name: "Jessop", team: "Verdant", color: "#006F62" },
];

const CENTER = 500;
const RADIUS = 400;

/**
 * Cars lapping a circular track (centre 500,500, radius 400). Each car starts
 * a fifth of a lap further round than the one before it and runs
 * `laps × pointsPerLap` samples; speed oscillates between 150 and 250.
 */
export function generateSyntheticTelemetry(
  options: SyntheticTelemetryOptions = {}
): SessionTelemetry {
  const count = options.entities ?? 5;
  const laps = options.laps ?? 3;
  const pointsPerLap = options.pointsPerLap ?? 100;
  const totalPoints = laps * pointsPerLap;

  const entities: SessionTelemetry["entities"] = {};
  for (let i = 0; i < count; i++) {
    const base = ROSTER[i % ROSTER.length];
    const cycle = Math.floor(i / ROSTER.length);
    const display: EntityDisplay =
      cycle === 0 ? { ...base } : { ...base, code: `${base.code}${cycle + 1}` };

    const offset = i * 0.2;
    const samples: RawTelemetrySample[] = [];
    for (let p = 0; p < totalPoints; p++) {
      const angle = (p / pointsPerLap + offset) * 2 * Math.PI;
      samples.push({
        index: p,
        time: Math.round(p * 100) / 1000,
        x: CENTER + RADIUS * Math.cos(angle),
        y: CENTER + RADIUS * Math.sin(angle),
        speed: 200 + 50 * Math.sin(angle * 3),
        lapNumber: Math.floor(p / pointsPerLap) + 1,
      });
    }
    entities[String(i + 1)] = { display, samples };
  }

  return { sessionKey: options.sessionKey ?? "synthetic", entities };
}
