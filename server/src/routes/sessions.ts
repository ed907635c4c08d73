import { Router, Request, Response, NextFunction } from "express";
import type { ServiceContext } from "../services/context.js";
import * as replaySvc from "../services/replay.js";
import {
  dataKeySchema,
  frameIndexSchema,
  frameQuerySchema,
} from "../utils/validators.js";

export function createSessionsRouter(ctx: ServiceContext) {
  const router = Router();

  // ─── GET /api/sessions/:sessionKey/frames — Page of replay frames ───────────

  router.get(
    "/:sessionKey/frames",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const sessionKey = dataKeySchema.parse(req.params.sessionKey);
        const query = frameQuerySchema.parse(req.query);
        const page = await replaySvc.getFramePage(ctx, sessionKey, query);
        // Frame sequences never change once built
        res.set("Cache-Control", "public, max-age=300");
        res.json(page);
      } catch (err) {
        next(err);
      }
    }
  );

  // ─── GET /api/sessions/:sessionKey/frames/:index — Single frame ─────────────

  router.get(
    "/:sessionKey/frames/:index",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const sessionKey = dataKeySchema.parse(req.params.sessionKey);
        const index = frameIndexSchema.parse(req.params.index);
        const query = frameQuerySchema.parse(req.query);
        const frame = await replaySvc.getFrame(ctx, sessionKey, index, query);
        res.set("Cache-Control", "public, max-age=300");
        res.json(frame);
      } catch (err) {
        next(err);
      }
    }
  );

  // ─── GET /api/sessions/:sessionKey/track-outline — Closed circuit outline ───

  router.get(
    "/:sessionKey/track-outline",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const sessionKey = dataKeySchema.parse(req.params.sessionKey);
        const query = frameQuerySchema.parse(req.query);
        const outline = await replaySvc.getTrackOutline(ctx, sessionKey, query);
        res.set("Cache-Control", "public, max-age=300");
        res.json(outline);
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
