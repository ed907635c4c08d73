import { readFile } from "fs/promises";
import { join, resolve } from "path";
import type { LapRecord, SessionTelemetry } from "../../../../shared/types.js";
import { AppError } from "../../middleware/error-handler.js";
import {
  dataKeySchema,
  lapHistorySchema,
  sessionTelemetrySchema,
} from "../../utils/validators.js";
import type { RaceDataSource } from "./types.js";

/**
 * Reads JSON exports from disk:
 *   <dataDir>/venues/<venueKey>.json     LapRecord[]
 *   <dataDir>/sessions/<sessionKey>.json SessionTelemetry
 */
export class FileRaceDataSource implements RaceDataSource {
  readonly id = "file";
  private readonly root: string;

  constructor(dataDir: string) {
    this.root = resolve(dataDir);
  }

  async getLapHistory(venueKey: string): Promise<LapRecord[]> {
    const raw = await this.readJson("venues", venueKey, "VENUE_NOT_FOUND");
    const result = lapHistorySchema.safeParse(raw);
    if (!result.success) {
      throw invalidFile(`venues/${venueKey}.json`, result.error.issues);
    }
    return result.data;
  }

  async getTelemetry(sessionKey: string): Promise<SessionTelemetry> {
    const raw = await this.readJson("sessions", sessionKey, "SESSION_NOT_FOUND");
    const result = sessionTelemetrySchema.safeParse(raw);
    if (!result.success) {
      throw invalidFile(`sessions/${sessionKey}.json`, result.error.issues);
    }
    return result.data;
  }

  private async readJson(
    dir: "venues" | "sessions",
    key: string,
    notFoundCode: string
  ): Promise<unknown> {
    // Keys become file names: never let one escape the data directory
    const safeKey = dataKeySchema.parse(key);
    const path = join(this.root, dir, `${safeKey}.json`);

    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        throw new AppError(404, `No ${dir.slice(0, -1)} data for "${safeKey}"`, notFoundCode);
      }
      throw err;
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new AppError(
        500,
        `${dir}/${safeKey}.json is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        "INVALID_DATA_FILE"
      );
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

function invalidFile(
  file: string,
  issues: Array<{ path: (string | number)[]; message: string }>
): AppError {
  const lines = issues
    .slice(0, 5)
    .map((i) => `${i.path.join(".")}: ${i.message}`);
  return new AppError(
    500,
    `${file} failed validation:\n${lines.join("\n")}`,
    "INVALID_DATA_FILE"
  );
}
