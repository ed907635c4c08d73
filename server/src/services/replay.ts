import type {
  Frame,
  FramePageResponse,
  FrameSequence,
  TrackOutline,
} from "../../../shared/types.js";
import { AppError } from "../middleware/error-handler.js";
import { preprocessFrames } from "../utils/replay/frame-preprocessor.js";
import { DEFAULT_VIEWPORT } from "../utils/replay/coordinate-normalizer.js";
import { extractTrackOutline } from "../utils/replay/track-outline.js";
import type { ServiceContext } from "./context.js";

export interface ReplayParams {
  sampleRate?: number;
  preserveAspectRatio?: boolean;
}

const viewportKey = `${DEFAULT_VIEWPORT.x.join(",")}/${DEFAULT_VIEWPORT.y.join(",")}`;

// ─── Frames ──────────────────────────────────────────────────────────────────

export function getFrameSequence(
  ctx: ServiceContext,
  sessionKey: string,
  params: ReplayParams = {}
): Promise<FrameSequence> {
  const sampleRate = params.sampleRate ?? ctx.settings.defaultSampleRate;
  const aspect = params.preserveAspectRatio ?? false;
  const key = [sessionKey, sampleRate, viewportKey, aspect ? "aspect" : "stretch"].join(":");

  return ctx.cache.frames.get(key, async () => {
    const telemetry = await ctx.source.getTelemetry(sessionKey);
    return preprocessFrames(telemetry, {
      sampleRate,
      viewport: DEFAULT_VIEWPORT,
      preserveAspectRatio: aspect,
    });
  });
}

export async function getFramePage(
  ctx: ServiceContext,
  sessionKey: string,
  params: ReplayParams & { offset: number; limit: number }
): Promise<FramePageResponse> {
  const seq = await getFrameSequence(ctx, sessionKey, params);
  return {
    sessionKey,
    sampleRate: seq.sampleRate,
    totalFrames: seq.totalFrames,
    offset: params.offset,
    frames: seq.frames.slice(params.offset, params.offset + params.limit),
  };
}

export async function getFrame(
  ctx: ServiceContext,
  sessionKey: string,
  index: number,
  params: ReplayParams = {}
): Promise<Frame> {
  const seq = await getFrameSequence(ctx, sessionKey, params);
  const frame = seq.frames[index];
  if (!frame) {
    throw new AppError(
      404,
      `Frame ${index} is out of range (0..${seq.totalFrames - 1})`,
      "FRAME_OUT_OF_RANGE"
    );
  }
  return frame;
}

// ─── Track outline ───────────────────────────────────────────────────────────

export function getTrackOutline(
  ctx: ServiceContext,
  sessionKey: string,
  params: Pick<ReplayParams, "preserveAspectRatio"> = {}
): Promise<TrackOutline> {
  const aspect = params.preserveAspectRatio ?? false;
  const key = [sessionKey, viewportKey, aspect ? "aspect" : "stretch"].join(":");

  return ctx.cache.outlines.get(key, async () => {
    const telemetry = await ctx.source.getTelemetry(sessionKey);
    return extractTrackOutline(telemetry, {
      viewport: DEFAULT_VIEWPORT,
      preserveAspectRatio: aspect,
    });
  });
}
