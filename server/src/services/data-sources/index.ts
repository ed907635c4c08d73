/**
 * Data source registry
 *
 * Maps the DATA_SOURCE setting to a collaborator implementation.
 */

import type { DataSourceOptions, RaceDataSource } from "./types.js";
import { FileRaceDataSource } from "./file.js";
import { SyntheticRaceDataSource } from "./synthetic.js";

const FACTORIES: Record<string, (options: DataSourceOptions) => RaceDataSource> = {
  file: (options) => new FileRaceDataSource(options.dataDir),
  synthetic: () => new SyntheticRaceDataSource(),
};

/** Get a data source by its ID */
export function getDataSource(
  id: string,
  options: DataSourceOptions
): RaceDataSource | undefined {
  const factory = FACTORIES[id];
  return factory ? factory(options) : undefined;
}

export function getDataSourceIds(): string[] {
  return Object.keys(FACTORIES);
}

export type { RaceDataSource, DataSourceOptions } from "./types.js";
export { FileRaceDataSource } from "./file.js";
export { SyntheticRaceDataSource } from "./synthetic.js";
