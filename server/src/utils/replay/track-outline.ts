import type {
  RawTelemetrySample,
  SessionTelemetry,
  TrackOutline,
  Viewport,
} from "../../../../shared/types.js";
import { InsufficientDataError } from "../errors.js";
import { createNormalizer, sessionBounds } from "./coordinate-normalizer.js";

export interface TrackOutlineOptions {
  maxPoints?: number;
  /** A lap needs at least this many samples to be used as the outline */
  minLapSamples?: number;
  /** Map into the same viewport the frames use; raw coordinates when omitted */
  viewport?: Viewport;
  preserveAspectRatio?: boolean;
}

/**
 * Approximate closed-loop outline of the circuit, traced from the entity with
 * the most telemetry. The first complete-looking lap is used; the result is
 * decimated to at most `maxPoints` and closed by repeating the first point.
 */
export function extractTrackOutline(
  telemetry: SessionTelemetry,
  options: TrackOutlineOptions = {}
): TrackOutline {
  const maxPoints = Math.max(3, options.maxPoints ?? 200);
  const minLapSamples = options.minLapSamples ?? 10;

  // ── Reference entity: most samples, ties by id ──────────────────
  let reference: RawTelemetrySample[] = [];
  let referenceId = "";
  for (const [id, entity] of Object.entries(telemetry.entities)) {
    const n = entity.samples.length;
    if (n > reference.length || (n === reference.length && n > 0 && id < referenceId)) {
      reference = entity.samples;
      referenceId = id;
    }
  }
  if (reference.length === 0) {
    throw new InsufficientDataError(
      `Session ${telemetry.sessionKey} has no telemetry to trace an outline from`,
      1,
      0,
      { sessionKey: telemetry.sessionKey }
    );
  }

  // ── Pick a lap ──────────────────────────────────────────────────
  const byLap = new Map<number, RawTelemetrySample[]>();
  for (const s of reference) {
    let arr = byLap.get(s.lapNumber);
    if (!arr) {
      arr = [];
      byLap.set(s.lapNumber, arr);
    }
    arr.push(s);
  }
  const lapNumbers = [...byLap.keys()].sort((a, b) => a - b);
  const lap = lapNumbers.find((l) => (byLap.get(l)?.length ?? 0) >= minLapSamples);
  const traced = lap === undefined ? reference : byLap.get(lap) ?? reference;

  // ── Decimate & close ────────────────────────────────────────────
  const stride = Math.ceil(traced.length / (maxPoints - 1));
  const points: [number, number][] = [];
  for (let i = 0; i < traced.length; i += stride) {
    points.push([traced[i].x, traced[i].y]);
  }
  const [fx, fy] = points[0];
  const [lx, ly] = points[points.length - 1];
  if (points.length > 1 && (fx !== lx || fy !== ly)) {
    points.push([fx, fy]);
  }

  if (!options.viewport) {
    return { sessionKey: telemetry.sessionKey, points };
  }

  const normalizer = createNormalizer(sessionBounds(telemetry), options.viewport, {
    onDegenerateAxis: "midpoint",
    preserveAspectRatio: options.preserveAspectRatio ?? false,
  });
  return {
    sessionKey: telemetry.sessionKey,
    points: points.map(([x, y]) => {
      const p = normalizer.map(x, y);
      return [p.x, p.y];
    }),
  };
}
