import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { RaceDataCache } from "./services/cache.js";
import { settingsFromEnv } from "./services/context.js";
import { getDataSource, getDataSourceIds } from "./services/data-sources/index.js";

function main() {
  const source = getDataSource(env.DATA_SOURCE, { dataDir: env.DATA_DIR });
  if (!source) {
    console.error(
      `✗ Unknown DATA_SOURCE "${env.DATA_SOURCE}" (expected one of: ${getDataSourceIds().join(", ")})`
    );
    process.exit(1);
  }

  // Lives as long as the process; cleared via DELETE /api/cache
  const cache = new RaceDataCache({ log: env.NODE_ENV !== "test" });
  const app = createApp({ source, cache, settings: settingsFromEnv(env) });

  const server = app.listen(env.PORT, () => {
    console.log(`✓ Server running on port ${env.PORT}`);
    console.log(`  Environment: ${env.NODE_ENV}`);
    console.log(`  Data source: ${source.id}${source.id === "file" ? ` (${env.DATA_DIR})` : ""}`);
    console.log(`  Frontend URL: ${env.FRONTEND_URL}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Shutting down gracefully...`);
    cache.clear();
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
