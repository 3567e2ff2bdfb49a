import type { FastifyInstance } from "fastify";
import {
  DEVICE_MODES,
  parseTimeOfDay,
  type Layout,
  type Playlist,
  type TimerSettings,
} from "../device/device-client.js";
import { ValidationError } from "../errors.js";
import type { SessionManager } from "../session/session-manager.js";
import type {
  MacParams,
  SetModeRequest,
  SetPowerRequest,
  SetTimerRequest,
  UploadMovieRequest,
} from "../types/protocol.js";
import { macParamsSchema } from "./devices.js";

interface DeviceSettingsRouteDeps {
  readonly sessions: SessionManager;
}

const SECONDS_PER_DAY = 86400;

const setModeSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    required: ["mode"],
    properties: {
      mode: { type: "string" as const, enum: [...DEVICE_MODES] },
    },
  },
};

const setPowerSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    required: ["on"],
    properties: {
      on: { type: "boolean" as const },
    },
  },
};

const timeOfDay = { type: ["string", "integer"] };

const setTimerSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    required: ["timeOn", "timeOff"],
    properties: {
      timeOn: timeOfDay,
      timeOff: timeOfDay,
    },
  },
};

const channel = { type: "integer" as const, minimum: 0, maximum: 255 };

const uploadMovieSchema = {
  params: macParamsSchema,
  body: {
    type: "object" as const,
    required: ["frames"],
    properties: {
      frames: {
        type: "array" as const,
        minItems: 1,
        items: {
          type: "array" as const,
          items: {
            type: "array" as const,
            minItems: 3,
            maxItems: 3,
            items: channel,
          },
        },
      },
      force: { type: "boolean" as const },
    },
  },
};

/** Seconds after midnight, or -1 to disable. */
function toTimerSeconds(value: string | number): number {
  if (typeof value === "string") {
    return parseTimeOfDay(value);
  }
  if (value !== -1 && (value < 0 || value >= SECONDS_PER_DAY)) {
    throw new ValidationError(`Timer value ${value} is not -1 or a second of the day`);
  }
  return value;
}

export function registerDeviceSettingsRoutes(
  app: FastifyInstance,
  deps: DeviceSettingsRouteDeps,
): void {
  const { sessions } = deps;

  app.get<{ Params: MacParams }>(
    "/devices/:mac/mode",
    { schema: { params: macParamsSchema } },
    async (request) => {
      const session = await sessions.getSession(request.params.mac);
      return { mode: await session.getMode() };
    },
  );

  app.put<{ Params: MacParams; Body: SetModeRequest }>(
    "/devices/:mac/mode",
    { schema: setModeSchema },
    async (request) => {
      const session = await sessions.getSession(request.params.mac);
      await session.setMode(request.body.mode);
      return { success: true, mode: request.body.mode };
    },
  );

  app.post<{ Params: MacParams; Body: SetPowerRequest }>(
    "/devices/:mac/power",
    { schema: setPowerSchema },
    async (request) => {
      const session = await sessions.getSession(request.params.mac);
      if (request.body.on) {
        await session.turnOn();
      } else {
        await session.turnOff();
      }
      return { success: true, mode: await session.getMode() };
    },
  );

  app.get<{ Params: MacParams }>(
    "/devices/:mac/timer",
    { schema: { params: macParamsSchema } },
    async (request): Promise<TimerSettings> => {
      const session = await sessions.getSession(request.params.mac);
      return session.getTimer();
    },
  );

  app.put<{ Params: MacParams; Body: SetTimerRequest }>(
    "/devices/:mac/timer",
    { schema: setTimerSchema },
    async (request) => {
      const timeOn = toTimerSeconds(request.body.timeOn);
      const timeOff = toTimerSeconds(request.body.timeOff);
      const session = await sessions.getSession(request.params.mac);
      await session.setTimer(timeOn, timeOff);
      return { success: true, timeOn, timeOff };
    },
  );

  app.get<{ Params: MacParams }>(
    "/devices/:mac/playlist",
    { schema: { params: macParamsSchema } },
    async (request): Promise<Playlist> => {
      const session = await sessions.getSession(request.params.mac);
      return session.getPlaylist();
    },
  );

  app.get<{ Params: MacParams }>(
    "/devices/:mac/layout",
    { schema: { params: macParamsSchema } },
    async (request): Promise<Layout> => {
      const session = await sessions.getSession(request.params.mac);
      return session.getLayout();
    },
  );

  app.get<{ Params: MacParams }>(
    "/devices/:mac/movies/capacity",
    { schema: { params: macParamsSchema } },
    async (request) => {
      const session = await sessions.getSession(request.params.mac);
      return { availableFrames: await session.getMovieCapacity() };
    },
  );

  app.delete<{ Params: MacParams }>(
    "/devices/:mac/movies",
    { schema: { params: macParamsSchema } },
    async (request) => {
      const session = await sessions.getSession(request.params.mac);
      await session.clearMovies();
      return { success: true };
    },
  );

  app.post<{ Params: MacParams; Body: UploadMovieRequest }>(
    "/devices/:mac/movies",
    { schema: uploadMovieSchema },
    async (request, reply) => {
      const session = await sessions.getSession(request.params.mac);
      const id = await session.uploadMovie(request.body.frames, {
        force: request.body.force,
      });
      return reply.status(201).send({ success: true, id, frames: request.body.frames.length });
    },
  );
}
