/**
 * Collaborator contract for historical laps and raw telemetry.
 *
 * The simulation and replay core never reads files or calls providers itself;
 * everything it consumes comes through a RaceDataSource. To add a source:
 *   1. Implement RaceDataSource in this directory
 *   2. Register its factory in index.ts
 */

import type { LapRecord, SessionTelemetry } from "../../../../shared/types.js";

export interface RaceDataSource {
  /** Unique ID used in configuration (DATA_SOURCE) */
  id: string;

  /** Historical lap records for one venue, possibly spanning several sessions */
  getLapHistory(venueKey: string): Promise<LapRecord[]>;

  /** Raw per-entity telemetry and display metadata for one recorded session */
  getTelemetry(sessionKey: string): Promise<SessionTelemetry>;
}

export interface DataSourceOptions {
  dataDir: string;
}
