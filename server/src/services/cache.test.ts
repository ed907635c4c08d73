import { describe, it, expect, vi } from "vitest";
import { RaceDataCache, SingleFlightCache } from "./cache.js";

interface Box {
  value: number;
}

/** A build whose completion the test controls */
function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("SingleFlightCache", () => {
  it("runs one build for concurrent requests of the same key", async () => {
    const cache = new SingleFlightCache<Box>("test");
    let builds = 0;
    const gate = deferred<void>();
    const build = async () => {
      builds++;
      await gate.promise;
      return { value: 42 };
    };

    const pending = Array.from({ length: 10 }, () => cache.get("k", build));
    gate.resolve();
    const results = await Promise.all(pending);

    expect(builds).toBe(1);
    for (const r of results) expect(r).toBe(results[0]);
    expect(cache.stats()).toEqual({
      entries: 1,
      inFlight: 0,
      hits: 9,
      misses: 1,
      builds: 1,
      failures: 0,
    });
  });

  it("serves later requests from the stored value", async () => {
    const cache = new SingleFlightCache<Box>("test");
    const build = vi.fn(() => ({ value: 1 }));
    const first = await cache.get("k", build);
    const second = await cache.get("k", build);
    expect(second).toBe(first);
    expect(build).toHaveBeenCalledTimes(1);
  });

  it("builds different keys separately", async () => {
    const cache = new SingleFlightCache<Box>("test");
    const [a, b] = await Promise.all([
      cache.get("a", () => ({ value: 1 })),
      cache.get("b", () => ({ value: 2 })),
    ]);
    expect(a.value).toBe(1);
    expect(b.value).toBe(2);
    expect(cache.size).toBe(2);
  });

  it("rejects every waiter on failure and does not store it", async () => {
    const cache = new SingleFlightCache<Box>("test");
    const gate = deferred<Box>();
    const failing = () => gate.promise;

    const a = cache.get("k", failing);
    const b = cache.get("k", failing);
    gate.reject(new Error("source unavailable"));

    await expect(a).rejects.toThrow("source unavailable");
    await expect(b).rejects.toThrow("source unavailable");
    expect(cache.has("k")).toBe(false);
    expect(cache.stats().failures).toBe(1);

    const retried = await cache.get("k", () => ({ value: 7 }));
    expect(retried.value).toBe(7);
    expect(cache.stats().builds).toBe(2);
  });

  it("turns a synchronous throw into a rejection", async () => {
    const cache = new SingleFlightCache<Box>("test");
    const p = cache.get("k", () => {
      throw new Error("boom");
    });
    await expect(p).rejects.toThrow("boom");
  });

  it("does not store a build that finishes after clear()", async () => {
    const cache = new SingleFlightCache<Box>("test");
    const gate = deferred<Box>();
    const pending = cache.get("k", () => gate.promise);

    cache.clear();
    gate.resolve({ value: 3 });

    expect((await pending).value).toBe(3);
    expect(cache.peek("k")).toBeUndefined();
  });

  it("keeps serving the old value during a refresh", async () => {
    const cache = new SingleFlightCache<Box>("test");
    await cache.get("k", () => ({ value: 1 }));

    const gate = deferred<Box>();
    const refreshing = cache.refresh("k", () => gate.promise);
    expect((await cache.get("k", () => ({ value: 99 }))).value).toBe(1);

    gate.resolve({ value: 2 });
    await refreshing;
    expect(cache.peek("k")?.value).toBe(2);
  });

  it("keeps the old value when a refresh fails", async () => {
    const cache = new SingleFlightCache<Box>("test");
    await cache.get("k", () => ({ value: 1 }));
    await expect(
      cache.refresh("k", () => Promise.reject(new Error("nope")))
    ).rejects.toThrow("nope");
    expect(cache.peek("k")?.value).toBe(1);
  });

  it("reports build durations", async () => {
    const onBuilt = vi.fn();
    const cache = new SingleFlightCache<Box>("test", onBuilt);
    await cache.get("k", () => ({ value: 1 }));
    expect(onBuilt).toHaveBeenCalledWith("k", expect.any(Number));
  });

  it("deletes single entries", async () => {
    const cache = new SingleFlightCache<Box>("test");
    await cache.get("k", () => ({ value: 1 }));
    expect(cache.delete("k")).toBe(true);
    expect(cache.size).toBe(0);
  });
});

describe("RaceDataCache", () => {
  it("clears one scope or all of them", async () => {
    const cache = new RaceDataCache();
    await cache.outlines.get("s", () => ({ sessionKey: "s", points: [] }));
    await cache.profiles.get("v", () => ({
      profile: {
        baselineDuration: 90,
        degradationPerLap: 0,
        durationStddev: 0,
        pitLossMean: 20,
        pitLossStddev: 0,
      },
      report: {
        totalRecords: 0,
        keptLaps: 0,
        pitLaps: 0,
        dropped: { invalid: 0, nonMonotonic: 0, belowMinimum: 0, aboveMedianMultiple: 0 },
        pitLossEstimated: false,
      },
    }));

    cache.clear("outlines");
    expect(cache.stats().outlines.entries).toBe(0);
    expect(cache.stats().profiles.entries).toBe(1);

    cache.clear();
    expect(cache.stats().profiles.entries).toBe(0);
  });
});
