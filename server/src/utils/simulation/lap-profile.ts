/**
 * Lap Profile Builder
 *
 * Turns historical lap records for one venue (optionally spanning several
 * sessions) into the statistical profile the race simulator draws from:
 *   - baseline lap time (median of clean laps)
 *   - degradation per lap (least-squares slope of lap time on lap number)
 *   - lap time spread (residual standard error of that fit)
 *   - pit loss mean / spread (pit lap minus fitted clean lap at that lap)
 *
 * Every dropped record is counted in the build report.
 */

import type {
  LapRecord,
  LapProfile,
  ProfileBuildReport,
  DroppedLapCounts,
} from "../../../../shared/types.js";
import { InsufficientDataError } from "../errors.js";
import { linearFit, mean, median, sampleStddev } from "./stats.js";

export interface LapProfileOptions {
  /** Minimum clean (non-pit) laps required after filtering */
  minValidLaps?: number;
  /** Track-specific floor, in seconds; shorter laps are rejected */
  minLapDuration?: number;
  /** Laps longer than this multiple of their session median are rejected */
  maxMedianMultiple?: number;
  /** Used when no pit laps survive filtering */
  fallbackPitLoss?: { mean: number; stddev: number };
}

export interface LapProfileResult {
  profile: LapProfile;
  report: ProfileBuildReport;
}

export const DEFAULT_PROFILE_OPTIONS = {
  minValidLaps: 5,
  minLapDuration: 0,
  maxMedianMultiple: 2,
  fallbackPitLoss: { mean: 20, stddev: 2 },
} satisfies Required<LapProfileOptions>;

/** Generic fallback for venues without enough history */
export const DEFAULT_LAP_PROFILE: LapProfile = Object.freeze({
  baselineDuration: 95,
  degradationPerLap: 0.05,
  durationStddev: 0.8,
  pitLossMean: 20,
  pitLossStddev: 2,
});

const NO_SESSION = "__default__";

// ─── Main entry point ────────────────────────────────────────────────────────

export function buildLapProfile(
  records: readonly LapRecord[],
  options: LapProfileOptions = {}
): LapProfileResult {
  const opts: Required<LapProfileOptions> = {
    minValidLaps: options.minValidLaps ?? DEFAULT_PROFILE_OPTIONS.minValidLaps,
    minLapDuration:
      options.minLapDuration ?? DEFAULT_PROFILE_OPTIONS.minLapDuration,
    maxMedianMultiple:
      options.maxMedianMultiple ?? DEFAULT_PROFILE_OPTIONS.maxMedianMultiple,
    fallbackPitLoss:
      options.fallbackPitLoss ?? DEFAULT_PROFILE_OPTIONS.fallbackPitLoss,
  };
  const dropped: DroppedLapCounts = {
    invalid: 0,
    nonMonotonic: 0,
    belowMinimum: 0,
    aboveMedianMultiple: 0,
  };

  // ── Structural filtering ─────────────────────────────────────────
  const lastLapSeen = new Map<string, number>();
  const structurallyValid: LapRecord[] = [];

  for (const rec of records) {
    if (
      !rec.isValid ||
      !Number.isFinite(rec.lapDuration) ||
      rec.lapDuration <= 0
    ) {
      dropped.invalid++;
      continue;
    }

    const seqKey = `${rec.sessionKey ?? NO_SESSION}\u0000${rec.entityId}`;
    const prevLap = lastLapSeen.get(seqKey);
    if (prevLap !== undefined && rec.lapNumber <= prevLap) {
      dropped.nonMonotonic++;
      continue;
    }
    lastLapSeen.set(seqKey, rec.lapNumber);
    structurallyValid.push(rec);
  }

  // ── Plausibility bounds (per-session median) ─────────────────────
  const bySession = new Map<string, number[]>();
  for (const rec of structurallyValid) {
    const key = rec.sessionKey ?? NO_SESSION;
    let arr = bySession.get(key);
    if (!arr) {
      arr = [];
      bySession.set(key, arr);
    }
    arr.push(rec.lapDuration);
  }
  const sessionMedian = new Map<string, number>();
  for (const [key, durations] of bySession) {
    sessionMedian.set(key, median(durations));
  }

  const kept: LapRecord[] = [];
  for (const rec of structurallyValid) {
    if (rec.lapDuration < opts.minLapDuration) {
      dropped.belowMinimum++;
      continue;
    }
    const med = sessionMedian.get(rec.sessionKey ?? NO_SESSION) ?? 0;
    if (rec.lapDuration > opts.maxMedianMultiple * med) {
      dropped.aboveMedianMultiple++;
      continue;
    }
    kept.push(rec);
  }

  const clean = kept.filter((r) => !r.pitFlag);
  const pits = kept.filter((r) => r.pitFlag);

  if (clean.length < opts.minValidLaps) {
    throw new InsufficientDataError(
      `Only ${clean.length} valid non-pit laps after filtering (need ${opts.minValidLaps})`,
      opts.minValidLaps,
      clean.length,
      { totalRecords: records.length, dropped }
    );
  }

  // ── Fit ──────────────────────────────────────────────────────────
  const fit = linearFit(
    clean.map((r) => r.lapNumber),
    clean.map((r) => r.lapDuration)
  );

  // ── Pit loss ─────────────────────────────────────────────────────
  const pitLosses = pits.map((r) => r.lapDuration - fit.predict(r.lapNumber));
  const pitLossEstimated = pitLosses.length > 0;

  const profile: LapProfile = Object.freeze({
    baselineDuration: median(clean.map((r) => r.lapDuration)),
    degradationPerLap: fit.slope,
    durationStddev: fit.residualStddev,
    pitLossMean: pitLossEstimated ? mean(pitLosses) : opts.fallbackPitLoss.mean,
    pitLossStddev: pitLossEstimated
      ? sampleStddev(pitLosses)
      : opts.fallbackPitLoss.stddev,
  });

  return {
    profile,
    report: {
      totalRecords: records.length,
      keptLaps: clean.length,
      pitLaps: pits.length,
      dropped,
      pitLossEstimated,
    },
  };
}
