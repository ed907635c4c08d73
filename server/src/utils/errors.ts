/**
 * Domain errors raised by the simulation and replay core.
 *
 * None of these are transient, so nothing in the core retries them. Each one
 * names the first offending element (lap, entity, frame index, axis) in
 * `details`; the HTTP error handler forwards that object as-is.
 */

export type SimulationErrorCode =
  | "INSUFFICIENT_DATA"
  | "INVALID_CONFIGURATION"
  | "FRAME_VALIDATION_FAILED"
  | "DEGENERATE_RANGE";

export abstract class SimulationError extends Error {
  abstract readonly code: SimulationErrorCode;

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
  }
}

export class InsufficientDataError extends SimulationError {
  readonly code = "INSUFFICIENT_DATA";

  constructor(
    message: string,
    public readonly required: number,
    public readonly available: number,
    details: Record<string, unknown> = {}
  ) {
    super(message, { required, available, ...details });
    this.name = "InsufficientDataError";
  }
}

export class InvalidConfigurationError extends SimulationError {
  readonly code = "INVALID_CONFIGURATION";

  constructor(
    message: string,
    public readonly field: string,
    details: Record<string, unknown> = {}
  ) {
    super(message, { field, ...details });
    this.name = "InvalidConfigurationError";
  }
}

export class FrameValidationError extends SimulationError {
  readonly code = "FRAME_VALIDATION_FAILED";

  constructor(
    public readonly frameIndex: number,
    public readonly field: string,
    public readonly reason: string,
    public readonly entityId?: string
  ) {
    super(
      entityId === undefined
        ? `Frame ${frameIndex}: ${field} ${reason}`
        : `Frame ${frameIndex}, entity ${entityId}: ${field} ${reason}`,
      { frameIndex, field, reason, ...(entityId !== undefined ? { entityId } : {}) }
    );
    this.name = "FrameValidationError";
  }
}

export class DegenerateRangeError extends SimulationError {
  readonly code = "DEGENERATE_RANGE";

  constructor(
    public readonly axis: "x" | "y",
    public readonly value: number
  ) {
    super(`Raw ${axis} range is zero (min = max = ${value})`, { axis, value });
    this.name = "DegenerateRangeError";
  }
}

export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}
