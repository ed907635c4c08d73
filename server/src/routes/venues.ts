import { Router, Request, Response, NextFunction } from "express";
import type { ServiceContext } from "../services/context.js";
import * as predictionSvc from "../services/prediction.js";
import { predictionLimiter } from "../middleware/rate-limit.js";
import {
  dataKeySchema,
  predictBodySchema,
  profileQuerySchema,
  simulateBodySchema,
} from "../utils/validators.js";

export function createVenuesRouter(ctx: ServiceContext) {
  const router = Router();

  // ─── GET /api/venues/:venueKey/profile — Lap profile + filtering report ─────

  router.get(
    "/:venueKey/profile",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const venueKey = dataKeySchema.parse(req.params.venueKey);
        const params = profileQuerySchema.parse(req.query);
        const { profile, report } = await predictionSvc.getProfile(ctx, venueKey, params);
        res.json({ venueKey, profile, report });
      } catch (err) {
        next(err);
      }
    }
  );

  // ─── POST /api/venues/:venueKey/simulate — One simulated race ───────────────

  router.post(
    "/:venueKey/simulate",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const venueKey = dataKeySchema.parse(req.params.venueKey);
        const body = simulateBodySchema.parse(req.body);
        const result = await predictionSvc.simulate(ctx, venueKey, body);
        res.json(result);
      } catch (err) {
        next(err);
      }
    }
  );

  // ─── POST /api/venues/:venueKey/predict — Ensemble podium probabilities ─────

  router.post(
    "/:venueKey/predict",
    predictionLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
      // Stop simulating once the client has gone away
      const controller = new AbortController();
      const onClose = () => {
        if (!res.writableEnded) controller.abort();
      };
      res.on("close", onClose);

      try {
        const venueKey = dataKeySchema.parse(req.params.venueKey);
        const body = predictBodySchema.parse(req.body);
        const result = await predictionSvc.predict(ctx, venueKey, body, controller.signal);
        res.json(result);
      } catch (err) {
        if (controller.signal.aborted) {
          console.log(`[predict] client disconnected, ensemble for ${req.params.venueKey} aborted`);
          return;
        }
        next(err);
      } finally {
        res.off("close", onClose);
      }
    }
  );

  return router;
}
