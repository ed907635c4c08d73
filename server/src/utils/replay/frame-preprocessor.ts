/**
 * Telemetry Frame Preprocessor
 *
 * Decimates per-entity telemetry into a fixed number of synchronized frames
 * for playback. Sample indices 0, S, 2S, … are kept (S = sampleRate), so an
 * entity with R samples contributes ceil(R / S) frames and the sequence length
 * is the minimum of that over every entity with samples. Nothing is
 * interpolated.
 *
 * Coordinates are mapped into the viewport with a single normalizer built from
 * the bounds of the whole session.
 */

import type {
  EntityDisplay,
  Frame,
  FrameEntity,
  FrameSequence,
  SessionTelemetry,
  Viewport,
} from "../../../../shared/types.js";
import { FrameValidationError, InvalidConfigurationError } from "../errors.js";
import {
  DEFAULT_VIEWPORT,
  createNormalizer,
  sessionBounds,
  type DegenerateAxisMode,
} from "./coordinate-normalizer.js";

export interface FrameOptions {
  sampleRate?: number;
  viewport?: Viewport;
  preserveAspectRatio?: boolean;
  onDegenerateAxis?: DegenerateAxisMode;
}

export const DEFAULT_SAMPLE_RATE = 5;

const ABSENT: FrameEntity = Object.freeze({ kind: "absent" as const });

const REQUIRED_DISPLAY_FIELDS = ["code", "name", "team", "color"] as const;
const REQUIRED_NUMERIC_FIELDS = ["x", "y", "speed", "lap"] as const;

/** Number of frames produced for a minimum raw sample count R and stride S */
export function expectedFrameCount(minRawSamples: number, sampleRate: number): number {
  if (minRawSamples <= 0) return 0;
  return Math.ceil(minRawSamples / sampleRate);
}

/** Fewest samples of any entity that has telemetry; 0 when none has any */
export function shortestSampleCount(telemetry: SessionTelemetry): number {
  let shortest = Infinity;
  for (const entity of Object.values(telemetry.entities)) {
    const n = entity.samples.length;
    if (n > 0 && n < shortest) shortest = n;
  }
  return shortest === Infinity ? 0 : shortest;
}

/** "3671C6" → "#3671C6"; anything that isn't a bare hex colour is left alone */
export function normalizeColor(color: string): string {
  const trimmed = color.trim();
  if (/^([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i.test(trimmed)) {
    return `#${trimmed}`;
  }
  return trimmed;
}

// ─── Main entry point ────────────────────────────────────────────────────────

export function preprocessFrames(
  telemetry: SessionTelemetry,
  options: FrameOptions = {}
): FrameSequence {
  const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
  if (!Number.isInteger(sampleRate) || sampleRate < 1) {
    throw new InvalidConfigurationError(
      `Sample rate must be a positive integer (got ${sampleRate})`,
      "sampleRate",
      { value: sampleRate }
    );
  }
  const viewport = options.viewport ?? DEFAULT_VIEWPORT;

  const entityIds = Object.keys(telemetry.entities).sort(compareEntityIds);
  const withSamples = entityIds.filter(
    (id) => (telemetry.entities[id]?.samples.length ?? 0) > 0
  );

  const rawSampleCount =
    withSamples.length > 0
      ? Math.min(...withSamples.map((id) => telemetry.entities[id].samples.length))
      : 0;

  // ── Session-wide bounds ─────────────────────────────────────────
  const bounds = sessionBounds(telemetry);
  const normalizer = createNormalizer(bounds, viewport, {
    onDegenerateAxis: options.onDegenerateAxis ?? "midpoint",
    preserveAspectRatio: options.preserveAspectRatio ?? false,
  });

  const displays = new Map<string, EntityDisplay>();
  for (const id of entityIds) {
    const d = telemetry.entities[id].display;
    displays.set(id, {
      code: d.code,
      name: d.name,
      team: d.team,
      color: normalizeColor(d.color),
    });
  }

  // ── Decimate ────────────────────────────────────────────────────
  const frames: Frame[] = [];
  for (let sampleIndex = 0; sampleIndex < rawSampleCount; sampleIndex += sampleRate) {
    const entities: Record<string, FrameEntity> = {};

    for (const id of entityIds) {
      const point = telemetry.entities[id].samples[sampleIndex];
      const display = displays.get(id);
      if (!point || !display) {
        entities[id] = ABSENT;
        continue;
      }
      const { x, y } = normalizer.map(point.x, point.y);
      const present: FrameEntity = {
        kind: "present",
        x,
        y,
        speed: point.speed,
        lap: point.lapNumber,
        ...display,
      };
      entities[id] = Object.freeze(present);
    }

    const frame: Frame = {
      index: frames.length,
      sampleIndex,
      entities: Object.freeze(entities),
    };
    frames.push(Object.freeze(frame));
  }

  const sequence: FrameSequence = {
    sessionKey: telemetry.sessionKey,
    sampleRate,
    totalFrames: frames.length,
    rawSampleCount,
    bounds,
    viewport,
    frames: Object.freeze(frames),
  };

  // Expected count comes straight from the raw telemetry, not from the loop above
  validateFrames(
    sequence.frames,
    expectedFrameCount(shortestSampleCount(telemetry), sampleRate),
    sampleRate
  );
  return Object.freeze(sequence);
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Structural check of a frame sequence. Throws FrameValidationError naming the
 * first offending frame, entity and field.
 */
export function validateFrames(
  frames: readonly Frame[],
  expectedFrames: number,
  sampleRate?: number
): void {
  if (expectedFrames === 0 || frames.length === 0) {
    throw new FrameValidationError(0, "frames", "no frames generated");
  }
  if (frames.length !== expectedFrames) {
    throw new FrameValidationError(
      Math.min(frames.length, expectedFrames),
      "frames",
      `count ${frames.length} does not match expected ${expectedFrames}`
    );
  }

  frames.forEach((frame, i) => {
    if (frame.index !== i) {
      throw new FrameValidationError(i, "index", `is ${frame.index}, expected ${i}`);
    }
    if (sampleRate !== undefined && frame.sampleIndex !== i * sampleRate) {
      throw new FrameValidationError(
        i,
        "sampleIndex",
        `is ${frame.sampleIndex}, expected ${i * sampleRate}`
      );
    }
    let present = 0;
    for (const [entityId, entity] of Object.entries(frame.entities)) {
      if (entity.kind === "absent") continue;
      present++;

      for (const field of REQUIRED_NUMERIC_FIELDS) {
        if (!Number.isFinite(entity[field])) {
          throw new FrameValidationError(i, field, "is not a finite number", entityId);
        }
      }
      for (const field of REQUIRED_DISPLAY_FIELDS) {
        if (entity[field].trim() === "") {
          throw new FrameValidationError(i, field, "is missing", entityId);
        }
      }
    }
    if (present === 0) {
      throw new FrameValidationError(i, "entities", "has no entities");
    }
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Numeric ids ("1", "44") sort numerically, everything else by code point */
function compareEntityIds(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  if (Number.isFinite(na) && Number.isFinite(nb) && na !== nb) return na - nb;
  return a < b ? -1 : a > b ? 1 : 0;
}
