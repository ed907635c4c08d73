import { z } from "zod";
import { MAX_SEED } from "./simulation/ensemble.js";

// ─── Collaborator payloads ───────────────────────────────────────────────────

export const lapRecordSchema = z.object({
  entityId: z.coerce.string().min(1),
  lapNumber: z.number().int().nonnegative(),
  // Not constrained here: the profile builder counts and drops bad durations
  lapDuration: z.number().nullable().transform((v) => v ?? Number.NaN),
  isValid: z.boolean().default(true),
  pitFlag: z.boolean().default(false),
  sessionKey: z.coerce.string().optional(),
});

export const lapHistorySchema = z.array(lapRecordSchema);

const rawSampleSchema = z.object({
  index: z.number().int().nonnegative(),
  time: z.number().optional(),
  x: z.number(),
  y: z.number(),
  speed: z.number(),
  lapNumber: z.number().int().nonnegative(),
});

const entityDisplaySchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  team: z.string().min(1).default("Unknown"),
  color: z.string().min(1).default("#FFFFFF"),
});

export const sessionTelemetrySchema = z.object({
  sessionKey: z.string().min(1),
  entities: z.record(
    z.string(),
    z.object({
      display: entityDisplaySchema,
      samples: z.array(rawSampleSchema),
    })
  ),
});

// ─── Route parameters ────────────────────────────────────────────────────────

// Keys double as file names for the file data source
export const dataKeySchema = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[A-Za-z0-9_-]+$/, "Key may only contain letters, digits, '-' and '_'");

export const profileQuerySchema = z.object({
  minValidLaps: z.coerce.number().int().min(1).optional(),
  maxMedianMultiple: z.coerce.number().positive().optional(),
  minLapDuration: z.coerce.number().nonnegative().optional(),
});

const strategyPlanSchema = z.object({
  entityId: z.coerce.string().min(1),
  pitLaps: z.array(z.number().int()),
});

// Ranges (race length ≥ 1, pit laps within the race, …) are enforced by the
// simulator itself so they surface as INVALID_CONFIGURATION
export const simulateBodySchema = z.object({
  entities: z.array(z.coerce.string().min(1)).max(100),
  raceLength: z.number().int().optional(),
  seed: z.number().int().min(0).max(MAX_SEED).optional(),
  strategies: z.array(strategyPlanSchema).optional(),
  pitPolicy: z
    .object({
      minStops: z.number().int(),
      maxStops: z.number().int(),
    })
    .optional(),
  lapTimeFloor: z.number().nonnegative().optional(),
  fallbackToDefault: z.boolean().default(false),
});

export type SimulateBody = z.infer<typeof simulateBodySchema>;

export const predictBodySchema = simulateBodySchema.extend({
  runs: z.number().int(),
});

export type PredictBody = z.infer<typeof predictBodySchema>;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const frameQuerySchema = z.object({
  sampleRate: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(200),
  preserveAspectRatio: booleanFlag.optional(),
});

export const frameIndexSchema = z.coerce.number().int().min(0);

export const cacheScopeSchema = z.object({
  scope: z.enum(["profiles", "frames", "outlines"]).optional(),
});
