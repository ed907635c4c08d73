import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { env } from "../config/env.js";
import {
  DegenerateRangeError,
  FrameValidationError,
  SimulationError,
} from "../utils/errors.js";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  // Zod validation errors
  if (err instanceof ZodError) {
    res.status(400).json({
      error: "Validation Error",
      code: "VALIDATION_ERROR",
      details: err.errors.map((e) => ({
        field: e.path.join("."),
        message: e.message,
      })),
    });
    return;
  }

  // Simulation / replay core failures: the request was well-formed but the
  // data or parameters can't produce a result
  if (err instanceof SimulationError) {
    // These two mean our own pipeline produced something unusable
    if (err instanceof FrameValidationError || err instanceof DegenerateRangeError) {
      console.error(`${err.name}:`, err.message);
    }
    res.status(422).json({
      error: err.message,
      code: err.code,
      details: err.details,
    });
    return;
  }

  // Known application errors
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Malformed JSON bodies and other client errors raised by express itself
  if (isHttpClientError(err)) {
    res.status(err.status).json({
      error: err.message,
      code: "BAD_REQUEST",
    });
    return;
  }

  // Unknown errors
  console.error("Unhandled error:", err);
  res.status(500).json({
    error:
      env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message,
    code: "INTERNAL_ERROR",
  });
}

function isHttpClientError(err: Error): err is Error & { status: number } {
  return (
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}
