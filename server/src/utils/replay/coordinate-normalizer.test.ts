import { describe, it, expect } from "vitest";
import type { Viewport } from "../../../../shared/types.js";
import { DegenerateRangeError } from "../errors.js";
import {
  computeBounds,
  createNormalizer,
  normalizeAxis,
  sessionBounds,
} from "./coordinate-normalizer.js";

describe("normalizeAxis", () => {
  it("maps the raw minimum to the viewport minimum", () => {
    expect(normalizeAxis(-250, -250, 750, 0, 1000)).toBe(0);
  });

  it("maps the raw maximum exactly to the viewport maximum", () => {
    expect(normalizeAxis(0.3, 0.1, 0.3, 10, 20)).toBe(20);
  });

  it("maps the midpoint to the midpoint", () => {
    expect(normalizeAxis(250, -250, 750, 0, 1000)).toBe(500);
  });

  it("handles an inverted viewport", () => {
    expect(normalizeAxis(25, 0, 100, 1000, 0)).toBe(750);
  });

  it("throws DegenerateRangeError on a zero range", () => {
    try {
      normalizeAxis(5, 5, 5, 0, 1000, "y");
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(DegenerateRangeError);
      if (err instanceof DegenerateRangeError) {
        expect(err.axis).toBe("y");
        expect(err.message).toBe("Raw y range is zero (min = max = 5)");
      }
    }
  });
});

describe("computeBounds", () => {
  it("skips non-finite points", () => {
    expect(
      computeBounds([
        { x: 1, y: 2 },
        { x: Number.NaN, y: 100 },
        { x: -3, y: 8 },
      ])
    ).toEqual({ minX: -3, maxX: 1, minY: 2, maxY: 8 });
  });

  it("returns null without any finite point", () => {
    expect(computeBounds([])).toBeNull();
  });
});

describe("sessionBounds", () => {
  it("covers every entity's samples", () => {
    const bounds = sessionBounds({
      sessionKey: "s",
      entities: {
        "1": {
          display: { code: "A", name: "A", team: "T", color: "#FFF" },
          samples: [{ index: 0, x: 10, y: -5, speed: 1, lapNumber: 1 }],
        },
        "2": {
          display: { code: "B", name: "B", team: "T", color: "#FFF" },
          samples: [{ index: 0, x: -20, y: 40, speed: 1, lapNumber: 1 }],
        },
      },
    });
    expect(bounds).toEqual({ minX: -20, maxX: 10, minY: -5, maxY: 40 });
  });

  it("is all zero for a session without samples", () => {
    expect(sessionBounds({ sessionKey: "s", entities: {} })).toEqual({
      minX: 0,
      maxX: 0,
      minY: 0,
      maxY: 0,
    });
  });
});

describe("createNormalizer", () => {
  const viewport: Viewport = { x: [0, 1000], y: [0, 1000] };

  it("maps each axis independently", () => {
    const n = createNormalizer({ minX: 0, maxX: 200, minY: 0, maxY: 100 }, viewport);
    expect(n.map(0, 0)).toEqual({ x: 0, y: 0 });
    expect(n.map(200, 100)).toEqual({ x: 1000, y: 1000 });
    expect(n.map(100, 25)).toEqual({ x: 500, y: 250 });
  });

  it("throws on a flat axis by default", () => {
    expect(() =>
      createNormalizer({ minX: 0, maxX: 10, minY: 3, maxY: 3 }, viewport)
    ).toThrow(DegenerateRangeError);
  });

  it("centres a flat axis in midpoint mode", () => {
    const n = createNormalizer({ minX: 0, maxX: 10, minY: 3, maxY: 3 }, viewport, {
      onDegenerateAxis: "midpoint",
    });
    expect(n.map(10, 3)).toEqual({ x: 1000, y: 500 });
  });

  it("keeps the aspect ratio when asked", () => {
    const n = createNormalizer({ minX: 0, maxX: 200, minY: 0, maxY: 100 }, viewport, {
      preserveAspectRatio: true,
    });
    expect(n.map(0, 0)).toEqual({ x: 0, y: 250 });
    expect(n.map(200, 100)).toEqual({ x: 1000, y: 750 });
    expect(n.map(100, 50)).toEqual({ x: 500, y: 500 });
  });
});
