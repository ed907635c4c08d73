import rateLimit from "express-rate-limit";

/**
 * Ensemble prediction: 20 requests per minute per IP
 */
export const predictionLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 20,
  message: { error: "Too many prediction requests. Please try again shortly.", code: "RATE_LIMITED" },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * General API: 300 requests per minute per IP (replay clients page frames often)
 */
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 300,
  message: { error: "Too many requests. Please slow down.", code: "RATE_LIMITED" },
  standardHeaders: true,
  legacyHeaders: false,
});
