import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const envSchema = z
  .object({
    // Data
    DATA_SOURCE: z.enum(["file", "synthetic"]).default("synthetic"),
    DATA_DIR: z.string().min(1).default("./data"),

    // Replay
    DEFAULT_SAMPLE_RATE: z.coerce.number().int().min(1).default(5),

    // Lap profile
    MIN_VALID_LAPS: z.coerce.number().int().min(1).default(5),
    MAX_MEDIAN_MULTIPLE: z.coerce.number().positive().default(2),
    MIN_LAP_DURATION: z.coerce.number().nonnegative().default(0),

    // Simulation
    PIT_STOPS_MIN: z.coerce.number().int().min(0).default(1),
    PIT_STOPS_MAX: z.coerce.number().int().min(0).default(2),
    DEFAULT_RACE_LENGTH: z.coerce.number().int().min(1).default(56),
    MAX_RACE_LENGTH: z.coerce.number().int().min(1).default(200),
    MAX_ENSEMBLE_RUNS: z.coerce.number().int().min(1).default(5000),

    // URLs
    FRONTEND_URL: z.string().url().default("http://localhost:5173"),

    // General
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    PORT: z.coerce.number().int().default(3000),
  })
  .refine((e) => e.PIT_STOPS_MIN <= e.PIT_STOPS_MAX, {
    message: "PIT_STOPS_MIN must not exceed PIT_STOPS_MAX",
    path: ["PIT_STOPS_MIN"],
  })
  .refine((e) => e.DEFAULT_RACE_LENGTH <= e.MAX_RACE_LENGTH, {
    message: "DEFAULT_RACE_LENGTH must not exceed MAX_RACE_LENGTH",
    path: ["DEFAULT_RACE_LENGTH"],
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export const env = parseEnv();
