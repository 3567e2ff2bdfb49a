import type { FastifyInstance } from "fastify";
import type { Rgb } from "../color/color-model.js";
import { parseNamedColor } from "../color/named-colors.js";
import { PATTERN_KINDS, type PatternSpec } from "../color/pattern.js";
import { MEANDER_STYLES } from "../effects/color-meander.js";
import { ValidationError } from "../errors.js";
import { collectFrames } from "../realtime/rt-input.js";
import type { SessionManager } from "../session/session-manager.js";
import type {
  ColorEffectRequest,
  ColorInput,
  EffectResponse,
  MacParams,
  MeanderEffectRequest,
  PatternEffectRequest,
  ShineEffectRequest,
  SpectrumEffectRequest,
  StreamFramesQuery,
} from "../types/protocol.js";
import { macParamsSchema } from "./devices.js";

interface EffectRouteDeps {
  readonly sessions: SessionManager;
  readonly defaultFrameRate: number;
}

const channel = { type: "integer" as const, minimum: 0, maximum: 255 };

// A type list, not oneOf: Ajv's array coercion would wrap a name into ["red"].
const colorInput = {
  type: ["string", "array"],
  minLength: 1,
  minItems: 3,
  maxItems: 3,
  items: channel,
};

const colorSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    required: ["color"],
    properties: { color: colorInput },
  },
};

const patternSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    required: ["kind"],
    properties: {
      kind: { type: "string" as const, enum: [...PATTERN_KINDS] },
      colors: { type: "array" as const, minItems: 1, items: colorInput },
      probabilities: { type: "array" as const, items: { type: "number" as const, minimum: 0 } },
      from: colorInput,
      to: colorInput,
      lightness: { type: "number" as const, minimum: -1, maximum: 1 },
      brightness: { type: "number" as const, minimum: 0, maximum: 1 },
    },
  },
};

const shineSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    required: ["colors"],
    properties: {
      colors: { type: "array" as const, minItems: 1, items: colorInput },
      numStartSimultaneous: { type: "integer" as const, minimum: 1 },
      timeBetweenGlowStartMs: { type: "number" as const, minimum: 0 },
      timeToMaxGlowMs: { type: "number" as const, minimum: 0 },
      timeToFadeMs: { type: "number" as const, minimum: 0 },
    },
  },
};

const meanderSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    properties: {
      style: { type: "string" as const, enum: [...MEANDER_STYLES] },
      speed: { type: "number" as const, minimum: 0 },
      noise: { type: "number" as const, minimum: 0 },
      complement: { type: "boolean" as const },
    },
  },
};

const spectrumSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    properties: {
      lightness: { type: "number" as const, minimum: -1, maximum: 1 },
      step: { type: "number" as const },
    },
  },
};

const framesSchema = {
  params: macParamsSchema,
  querystring: {
    type: "object" as const,
    properties: {
      format: { type: "string" as const, enum: ["csv", "hex"] },
      errorMode: { type: "string" as const, enum: ["abort", "skip"] },
      ledsPerFrame: { type: "integer" as const, minimum: 1 },
      frameRate: { type: "number" as const, exclusiveMinimum: 0, maximum: 100 },
    },
  },
  body: { type: "string" as const },
};

function toRgb(color: ColorInput): Rgb {
  return typeof color === "string" ? parseNamedColor(color) : color;
}

function requireField<T>(value: T | undefined, kind: string, field: string): T {
  if (value === undefined) {
    throw new ValidationError(`Pattern "${kind}" needs "${field}"`);
  }
  return value;
}

function toPatternSpec(body: PatternEffectRequest): PatternSpec {
  switch (body.kind) {
    case "alternating":
      return { kind: body.kind, colors: requireField(body.colors, body.kind, "colors").map(toRgb) };
    case "random-colors":
      return { kind: body.kind, lightness: body.lightness ?? 0 };
    case "random-blend":
      return {
        kind: body.kind,
        from: toRgb(requireField(body.from, body.kind, "from")),
        to: toRgb(requireField(body.to, body.kind, "to")),
      };
    case "random-select":
      return {
        kind: body.kind,
        colors: requireField(body.colors, body.kind, "colors").map(toRgb),
        probabilities: body.probabilities,
      };
  }
}

export function registerEffectRoutes(
  app: FastifyInstance,
  deps: EffectRouteDeps,
): void {
  const { sessions } = deps;

  app.post<{ Params: MacParams; Body: ColorEffectRequest }>(
    "/devices/:mac/effects/color",
    { schema: colorSchema },
    async (request): Promise<EffectResponse> => {
      const color = toRgb(request.body.color);
      const session = await sessions.getSession(request.params.mac);
      await session.showSolidColor(color);
      return { success: true, animation: session.currentAnimation() };
    },
  );

  app.post<{ Params: MacParams; Body: PatternEffectRequest }>(
    "/devices/:mac/effects/pattern",
    { schema: patternSchema },
    async (request): Promise<EffectResponse> => {
      const spec = toPatternSpec(request.body);
      const session = await sessions.getSession(request.params.mac);
      await session.showPattern(spec, request.body.brightness ?? 1);
      return { success: true, animation: session.currentAnimation() };
    },
  );

  app.post<{ Params: MacParams; Body: ShineEffectRequest }>(
    "/devices/:mac/effects/shine",
    { schema: shineSchema },
    async (request): Promise<EffectResponse> => {
      const body = request.body;
      const colors = body.colors.map(toRgb);
      const session = await sessions.getSession(request.params.mac);
      await session.shine({
        colors,
        numStartSimultaneous: body.numStartSimultaneous ?? 1,
        timeBetweenGlowStartMs: body.timeBetweenGlowStartMs ?? 100,
        timeToMaxGlowMs: body.timeToMaxGlowMs ?? 1000,
        timeToFadeMs: body.timeToFadeMs ?? 2000,
      });
      return { success: true, animation: session.currentAnimation() };
    },
  );

  app.post<{ Params: MacParams; Body: MeanderEffectRequest | undefined }>(
    "/devices/:mac/effects/meander",
    { schema: meanderSchema },
    async (request): Promise<EffectResponse> => {
      const body = request.body ?? {};
      const session = await sessions.getSession(request.params.mac);
      await session.meander({
        style: body.style ?? "surface",
        speed: body.speed ?? 0.02,
        noise: body.noise ?? 0.01,
        complement: body.complement ?? false,
      });
      return { success: true, animation: session.currentAnimation() };
    },
  );

  app.post<{ Params: MacParams; Body: SpectrumEffectRequest | undefined }>(
    "/devices/:mac/effects/spectrum",
    { schema: spectrumSchema },
    async (request): Promise<EffectResponse> => {
      const body = request.body ?? {};
      const session = await sessions.getSession(request.params.mac);
      await session.spectrum({
        lightness: body.lightness ?? 0,
        step: body.step ?? 1,
      });
      return { success: true, animation: session.currentAnimation() };
    },
  );

  app.post<{ Params: MacParams }>(
    "/devices/:mac/effects/stop",
    { schema: { params: macParamsSchema } },
    async (request): Promise<EffectResponse> => {
      const session = await sessions.getSession(request.params.mac);
      await session.stopAnimation();
      return { success: true, animation: null };
    },
  );

  app.post<{ Params: MacParams; Querystring: StreamFramesQuery; Body: string }>(
    "/devices/:mac/frames",
    { schema: framesSchema },
    async (request) => {
      const session = await sessions.getSession(request.params.mac);
      const query = request.query;
      const frames = collectFrames(request.body.split(/\r?\n/), {
        format: query.format ?? "csv",
        ledsPerFrame: query.ledsPerFrame ?? session.getInfo().numberOfLed,
        errorMode: query.errorMode ?? "abort",
        logger: {
          info: (msg) => request.log.info(msg),
          warn: (msg) => request.log.warn(msg),
          error: (msg) => request.log.error(msg),
        },
      });
      if (frames.length === 0) {
        throw new ValidationError("Request body holds no complete frame");
      }

      await session.streamFrames(frames, query.frameRate ?? deps.defaultFrameRate);
      return { success: true, frames: frames.length, animation: session.currentAnimation() };
    },
  );
}
