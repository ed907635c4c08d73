import { Router } from "express";
import type { ServiceContext } from "../services/context.js";

export function createHealthRouter(ctx: ServiceContext) {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      dataSource: ctx.source.id,
    });
  });

  return router;
}
