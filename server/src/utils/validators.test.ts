import { describe, it, expect } from "vitest";
import { predictBodySchema, simulateBodySchema } from "./validators.js";

describe("simulateBodySchema", () => {
  it("defaults fallbackToDefault to false", () => {
    expect(simulateBodySchema.parse({ entities: ["1"] })).toEqual({
      entities: ["1"],
      fallbackToDefault: false,
    });
  });

  it("accepts seeds across the 32-bit range", () => {
    expect(simulateBodySchema.parse({ entities: ["1"], seed: 0 }).seed).toBe(0);
    expect(simulateBodySchema.parse({ entities: ["1"], seed: 4294967295 }).seed).toBe(4294967295);
  });

  it("rejects seeds outside the 32-bit range", () => {
    expect(simulateBodySchema.safeParse({ entities: ["1"], seed: 4294967296 }).success).toBe(false);
    expect(simulateBodySchema.safeParse({ entities: ["1"], seed: -1 }).success).toBe(false);
    expect(predictBodySchema.safeParse({ entities: ["1"], runs: 5, seed: 1e17 }).success).toBe(false);
  });
});
