import { Router, Request, Response, NextFunction } from "express";
import type { ServiceContext } from "../services/context.js";
import { cacheScopeSchema } from "../utils/validators.js";

export function createCacheRouter(ctx: ServiceContext) {
  const router = Router();

  // ─── GET /api/cache — Hit/miss/build counters per cache ─────────────────────

  router.get("/", (_req: Request, res: Response) => {
    res.json(ctx.cache.stats());
  });

  // ─── DELETE /api/cache — Explicit clear (optionally one scope) ──────────────

  router.delete("/", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { scope } = cacheScopeSchema.parse(req.query);
      ctx.cache.clear(scope);
      console.log(`[cache] cleared ${scope ?? "all"}`);
      res.json({ cleared: scope ?? "all" });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
