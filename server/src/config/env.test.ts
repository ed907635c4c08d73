import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseEnv } from "./env.js";
import { settingsFromEnv } from "../services/context.js";

describe("parseEnv", () => {
  it("fills in defaults", () => {
    const env = parseEnv({});
    expect(env.DATA_SOURCE).toBe("synthetic");
    expect(env.DEFAULT_SAMPLE_RATE).toBe(5);
    expect(env.MIN_VALID_LAPS).toBe(5);
    expect(env.PORT).toBe(3000);
    expect(env.MAX_RACE_LENGTH).toBe(200);
  });

  it("coerces numeric strings", () => {
    const env = parseEnv({ DEFAULT_SAMPLE_RATE: "10", MAX_MEDIAN_MULTIPLE: "1.5" });
    expect(env.DEFAULT_SAMPLE_RATE).toBe(10);
    expect(env.MAX_MEDIAN_MULTIPLE).toBe(1.5);
  });

  it("rejects an unknown data source", () => {
    expect(() => parseEnv({ DATA_SOURCE: "ftp" })).toThrow(ZodError);
  });

  it("rejects inverted pit stop bounds", () => {
    expect(() => parseEnv({ PIT_STOPS_MIN: "3", PIT_STOPS_MAX: "1" })).toThrow(
      "PIT_STOPS_MIN must not exceed PIT_STOPS_MAX"
    );
  });
});

describe("race length limits", () => {
  it("rejects a default race length above the maximum", () => {
    expect(() => parseEnv({ DEFAULT_RACE_LENGTH: "80", MAX_RACE_LENGTH: "60" })).toThrow(
      "DEFAULT_RACE_LENGTH must not exceed MAX_RACE_LENGTH"
    );
  });
});

describe("settingsFromEnv", () => {
  it("groups pit stop bounds into a policy", () => {
    const settings = settingsFromEnv(parseEnv({ PIT_STOPS_MIN: "0", PIT_STOPS_MAX: "3" }));
    expect(settings.pitPolicy).toEqual({ minStops: 0, maxStops: 3 });
  });
});
