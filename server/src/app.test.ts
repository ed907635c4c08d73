import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import { z } from "zod";
import { createApp } from "./app.js";
import { RaceDataCache } from "./services/cache.js";
import type { ServiceContext } from "./services/context.js";
import { SyntheticRaceDataSource } from "./services/data-sources/synthetic.js";

const ctx: ServiceContext = {
  source: new SyntheticRaceDataSource(),
  cache: new RaceDataCache(),
  settings: {
    defaultSampleRate: 5,
    minValidLaps: 5,
    maxMedianMultiple: 2,
    minLapDuration: 0,
    pitPolicy: { minStops: 1, maxStops: 2 },
    defaultRaceLength: 10,
    maxRaceLength: 60,
    maxEnsembleRuns: 200,
  },
};

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  server = await new Promise<Server>((resolve) => {
    const s = createApp(ctx).listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server has no TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", dataSource: "synthetic" });
  });

  it("returns a venue profile with its report", async () => {
    const res = await fetch(`${baseUrl}/api/venues/spa/profile`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      venueKey: "spa",
      profile: { baselineDuration: expect.any(Number) },
      report: { totalRecords: 900 },
    });
  });

  it("rejects keys with path characters", async () => {
    const res = await fetch(`${baseUrl}/api/venues/spa.old/profile`);
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("simulates a seeded race", async () => {
    const request = { entities: ["1", "2", "3"], seed: 5 };
    const a = await (await post("/api/venues/spa/simulate", request)).json();
    const b = await (await post("/api/venues/spa/simulate", request)).json();
    expect(a).toMatchObject({
      profileSource: "history",
      trajectory: { seed: 5, raceLength: 10, finishingOrder: expect.arrayContaining(["1", "2", "3"]) },
    });
    expect(a).toEqual(b);
  });

  it("maps configuration errors to 422", async () => {
    const res = await post("/api/venues/spa/simulate", { entities: ["1"], raceLength: 0 });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "Race length must be a positive integer (got 0)",
      code: "INVALID_CONFIGURATION",
      details: { field: "raceLength", value: 0 },
    });
  });

  it("rejects seeds outside the 32-bit range", async () => {
    const res = await post("/api/venues/spa/predict", {
      entities: ["1", "2"],
      runs: 4,
      seed: 1e17,
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: "VALIDATION_ERROR",
      details: [{ field: "seed" }],
    });
  });

  it("predicts podium odds", async () => {
    const res = await post("/api/venues/spa/predict", {
      entities: ["1", "2", "3", "4"],
      runs: 30,
      seed: 3,
    });
    expect(res.status).toBe(200);
    const entry = { entityId: expect.any(String), winProbability: expect.any(Number) };
    expect(await res.json()).toMatchObject({
      baseSeed: 3,
      prediction: { runs: 30, stable: false, entities: [entry, entry, entry, entry] },
    });
  });

  it("rejects malformed JSON", async () => {
    const res = await fetch(`${baseUrl}/api/venues/spa/simulate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{ not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "BAD_REQUEST" });
  });

  it("pages replay frames", async () => {
    const res = await fetch(`${baseUrl}/api/sessions/demo/frames?offset=1&limit=2`);
    expect(res.status).toBe(200);
    expect(res.headers.get("cache-control")).toBe("public, max-age=300");
    expect(await res.json()).toMatchObject({
      sessionKey: "demo",
      totalFrames: 60,
      offset: 1,
      frames: [{ index: 1, sampleIndex: 5 }, { index: 2, sampleIndex: 10 }],
    });
  });

  it("answers 404 for a frame past the end", async () => {
    const res = await fetch(`${baseUrl}/api/sessions/demo/frames/60`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: "FRAME_OUT_OF_RANGE" });
  });

  it("rejects a zero sample rate", async () => {
    const res = await fetch(`${baseUrl}/api/sessions/demo/frames?sampleRate=0`);
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      code: "INVALID_CONFIGURATION",
      details: { field: "sampleRate" },
    });
  });

  it("serves the track outline", async () => {
    const res = await fetch(`${baseUrl}/api/sessions/demo/track-outline`);
    const outline = z
      .object({ sessionKey: z.string(), points: z.array(z.tuple([z.number(), z.number()])) })
      .parse(await res.json());
    expect(outline.sessionKey).toBe("demo");
    expect(outline.points).toHaveLength(101);
  });

  it("clears one cache scope", async () => {
    const res = await fetch(`${baseUrl}/api/cache?scope=frames`, { method: "DELETE" });
    expect(await res.json()).toEqual({ cleared: "frames" });
    const stats = await (await fetch(`${baseUrl}/api/cache`)).json();
    // Only the "spa" profile with default filters was built above
    expect(stats).toMatchObject({ frames: { entries: 0 }, profiles: { entries: 1 } });
  });

  it("rejects an unknown cache scope", async () => {
    const res = await fetch(`${baseUrl}/api/cache?scope=everything`, { method: "DELETE" });
    expect(res.status).toBe(400);
  });
});
