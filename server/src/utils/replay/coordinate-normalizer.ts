/**
 * Coordinate Normalizer
 *
 * Per-axis affine map from raw telemetry coordinates into a bounded viewport:
 *
 *   viz = vizMin + (raw - rawMin) / (rawMax - rawMin) * (vizMax - vizMin)
 *
 * The raw bounds must come from the whole session, never from one frame,
 * otherwise the track shape drifts between frames.
 */

import type {
  CoordinateBounds,
  SessionTelemetry,
  Viewport,
} from "../../../../shared/types.js";
import { DegenerateRangeError } from "../errors.js";

export type DegenerateAxisMode = "throw" | "midpoint";

export interface NormalizerOptions {
  /** What to do with an axis whose raw range is zero (default "throw") */
  onDegenerateAxis?: DegenerateAxisMode;
  /** Use one scale for both axes and centre the shorter one */
  preserveAspectRatio?: boolean;
}

export interface CoordinateNormalizer {
  bounds: CoordinateBounds;
  viewport: Viewport;
  map(x: number, y: number): { x: number; y: number };
}

export const DEFAULT_VIEWPORT: Viewport = { x: [0, 1000], y: [0, 1000] };

export function computeBounds(
  points: Iterable<{ x: number; y: number }>
): CoordinateBounds | null {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;

  for (const p of points) {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) continue;
    if (p.x < minX) minX = p.x;
    if (p.x > maxX) maxX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.y > maxY) maxY = p.y;
  }

  if (minX === Infinity) return null;
  return { minX, maxX, minY, maxY };
}

/** Bounds over every sample of every entity; all zero for an empty session */
export function sessionBounds(telemetry: SessionTelemetry): CoordinateBounds {
  function* samples() {
    for (const entity of Object.values(telemetry.entities)) {
      yield* entity.samples;
    }
  }
  return computeBounds(samples()) ?? { minX: 0, maxX: 0, minY: 0, maxY: 0 };
}

export function normalizeAxis(
  raw: number,
  rawMin: number,
  rawMax: number,
  vizMin: number,
  vizMax: number,
  axis: "x" | "y" = "x"
): number {
  if (rawMax === rawMin) throw new DegenerateRangeError(axis, rawMin);
  if (raw === rawMax) return vizMax;
  return vizMin + ((raw - rawMin) / (rawMax - rawMin)) * (vizMax - vizMin);
}

export function createNormalizer(
  bounds: CoordinateBounds,
  viewport: Viewport = DEFAULT_VIEWPORT,
  options: NormalizerOptions = {}
): CoordinateNormalizer {
  const mode = options.onDegenerateAxis ?? "throw";
  const [vxMin, vxMax] = viewport.x;
  const [vyMin, vyMax] = viewport.y;
  const spanX = bounds.maxX - bounds.minX;
  const spanY = bounds.maxY - bounds.minY;

  if (mode === "throw") {
    if (spanX === 0) throw new DegenerateRangeError("x", bounds.minX);
    if (spanY === 0) throw new DegenerateRangeError("y", bounds.minY);
  }

  const midX = (vxMin + vxMax) / 2;
  const midY = (vyMin + vyMax) / 2;

  if (options.preserveAspectRatio) {
    const span = Math.max(spanX, spanY);
    const scale = Math.min(
      span === 0 ? 0 : (vxMax - vxMin) / span,
      span === 0 ? 0 : (vyMax - vyMin) / span
    );
    const cx = (bounds.minX + bounds.maxX) / 2;
    const cy = (bounds.minY + bounds.maxY) / 2;
    return {
      bounds,
      viewport,
      map: (x, y) => ({
        x: midX + (x - cx) * scale,
        y: midY + (y - cy) * scale,
      }),
    };
  }

  return {
    bounds,
    viewport,
    map: (x, y) => ({
      x:
        spanX === 0
          ? midX
          : normalizeAxis(x, bounds.minX, bounds.maxX, vxMin, vxMax, "x"),
      y:
        spanY === 0
          ? midY
          : normalizeAxis(y, bounds.minY, bounds.maxY, vyMin, vyMax, "y"),
    }),
  };
}
