import { describe, it, expect } from "vitest";
import { mixSeed, SeededRandom } from "./random.js";

describe("SeededRandom", () => {
  it("starts from the LCG step of the mixed seed", () => {
    // mixSeed(0) is 0, so seed 0 starts from the bare increment
    expect(new SeededRandom(0).next()).toBe(1013904223 / 4294967296);
  });

  it("spreads the first draw of consecutive seeds", () => {
    const counts = { 1: 0, 2: 0 };
    for (let seed = 1000; seed < 1200; seed++) {
      const v = new SeededRandom(seed).int(1, 2);
      if (v === 1 || v === 2) counts[v]++;
    }
    expect(counts[1] + counts[2]).toBe(200);
    expect(counts[1]).toBeGreaterThan(70);
    expect(counts[2]).toBeGreaterThan(70);
  });

  it("replays the same sequence for the same seed", () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("keeps independent instances independent", () => {
    const a = new SeededRandom(7);
    const b = new SeededRandom(7);
    a.next();
    a.next();
    const fresh = new SeededRandom(7);
    expect(b.next()).toBe(fresh.next());
  });

  it("stays within [0, 1)", () => {
    const rng = new SeededRandom(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("draws integers within inclusive bounds", () => {
    const rng = new SeededRandom(9);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = rng.int(1, 3);
      expect(Number.isInteger(v)).toBe(true);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([1, 2, 3]);
  });

  it("returns the mean for a zero-spread normal", () => {
    expect(new SeededRandom(1).normal(95.5, 0)).toBe(95.5);
  });

  it("samples without replacement and leaves the pool alone", () => {
    const pool = [2, 3, 4, 5, 6, 7, 8];
    const picked = new SeededRandom(5).sample(pool, 4);
    expect(picked).toHaveLength(4);
    expect(new Set(picked).size).toBe(4);
    for (const v of picked) expect(pool).toContain(v);
    expect(pool).toEqual([2, 3, 4, 5, 6, 7, 8]);
  });

  it("caps the sample size at the pool size", () => {
    expect(new SeededRandom(5).sample([1, 2], 5)).toHaveLength(2);
  });
});

describe("mixSeed", () => {
  it("keeps zero at zero", () => {
    expect(mixSeed(0)).toBe(0);
  });

  it("maps distinct seeds to distinct 32-bit states", () => {
    const seen = new Set<number>();
    for (let seed = 0; seed < 1000; seed++) {
      const h = mixSeed(seed);
      expect(Number.isInteger(h)).toBe(true);
      expect(h).toBeGreaterThanOrEqual(0);
      expect(h).toBeLessThanOrEqual(4294967295);
      seen.add(h);
    }
    expect(seen.size).toBe(1000);
  });
});
