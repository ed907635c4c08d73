import { describe, it, expect } from "vitest";
import { buildLapProfile } from "../../utils/simulation/lap-profile.js";
import { generateLapHistory, hashKey, SyntheticRaceDataSource } from "./synthetic.js";
import { getDataSource, getDataSourceIds } from "./index.js";

describe("generateLapHistory", () => {
  it("is deterministic for a seed", () => {
    expect(generateLapHistory(11)).toEqual(generateLapHistory(11));
  });

  it("covers every session, entity and lap", () => {
    const history = generateLapHistory(3, { sessions: 2, entities: 4, laps: 12 });
    expect(history).toHaveLength(2 * 4 * 12);
    expect(new Set(history.map((r) => r.sessionKey))).toEqual(new Set(["S1", "S2"]));
  });

  it("gives each car one or two pit laps per session", () => {
    const history = generateLapHistory(5, { sessions: 1, entities: 6, laps: 20 });
    for (const id of ["1", "2", "3", "4", "5", "6"]) {
      const pits = history.filter((r) => r.entityId === id && r.pitFlag);
      expect(pits.length).toBeGreaterThanOrEqual(1);
      expect(pits.length).toBeLessThanOrEqual(2);
      for (const p of pits) {
        expect(p.lapNumber).toBeGreaterThanOrEqual(2);
        expect(p.lapNumber).toBeLessThanOrEqual(19);
      }
    }
  });

  it("builds a plausible profile", () => {
    const { profile, report } = buildLapProfile(generateLapHistory(2024));
    expect(profile.baselineDuration).toBeGreaterThan(93);
    expect(profile.baselineDuration).toBeLessThan(98);
    expect(profile.pitLossMean).toBeGreaterThan(17);
    expect(profile.pitLossMean).toBeLessThan(25);
    expect(report.pitLossEstimated).toBe(true);
  });
});

describe("hashKey", () => {
  it("matches 32-bit FNV-1a", () => {
    expect(hashKey("")).toBe(0x811c9dc5);
    expect(hashKey("a")).toBe(0xe40c292c);
  });
});

describe("SyntheticRaceDataSource", () => {
  it("returns the same history for the same venue", async () => {
    const source = new SyntheticRaceDataSource({ sessions: 1, entities: 3, laps: 8 });
    expect(await source.getLapHistory("monza")).toEqual(await source.getLapHistory("monza"));
  });

  it("labels telemetry with the session key", async () => {
    const telemetry = await new SyntheticRaceDataSource().getTelemetry("fp2");
    expect(telemetry.sessionKey).toBe("fp2");
    expect(Object.keys(telemetry.entities)).toHaveLength(5);
  });
});

describe("data source registry", () => {
  it("creates sources by id", () => {
    expect(getDataSource("synthetic", { dataDir: "." })?.id).toBe("synthetic");
    expect(getDataSource("file", { dataDir: "." })?.id).toBe("file");
    expect(getDataSource("ftp", { dataDir: "." })).toBeUndefined();
    expect(getDataSourceIds()).toEqual(["file", "synthetic"]);
  });
});
