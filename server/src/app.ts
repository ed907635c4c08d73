import express from "express";
import cors from "cors";
import helmet from "helmet";
import { env } from "./config/env.js";
import { errorHandler } from "./middleware/error-handler.js";
import { apiLimiter } from "./middleware/rate-limit.js";
import type { ServiceContext } from "./services/context.js";
import { createHealthRouter } from "./routes/health.js";
import { createVenuesRouter } from "./routes/venues.js";
import { createSessionsRouter } from "./routes/sessions.js";
import { createCacheRouter } from "./routes/cache.js";

export function createApp(ctx: ServiceContext) {
  const app = express();

  // Trust proxy (reverse proxy in front of the API)
  app.set("trust proxy", 1);

  // ─── Security ───────────────────────────────────────────────────────────────
  app.use(helmet());

  app.use(
    cors({
      origin: env.FRONTEND_URL,
      methods: ["GET", "POST", "DELETE"],
      allowedHeaders: ["Content-Type"],
    })
  );

  // ─── Body Parsing ──────────────────────────────────────────────────────────
  app.use(express.json({ limit: "1mb" }));

  // ─── Rate Limiting ───────────────────────────────────────────────────────
  app.use("/api", apiLimiter);

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use("/api/health", createHealthRouter(ctx));
  app.use("/api/venues", createVenuesRouter(ctx));
  app.use("/api/sessions", createSessionsRouter(ctx));
  app.use("/api/cache", createCacheRouter(ctx));

  // ─── Error Handling ─────────────────────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
