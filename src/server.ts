import Fastify, { type FastifyInstance } from "fastify";
import type { ServerConfig } from "./config/server-config.js";
import {
  AuthenticationError,
  DeviceNotFoundError,
  ProtocolError,
  TransportError,
  ValidationError,
  isStrandlightError,
} from "./errors.js";
import type { SessionManager } from "./session/session-manager.js";
import type { ErrorResponse } from "./types/protocol.js";
import { registerHealthRoute } from "./routes/health.js";
import { registerDeviceRoutes } from "./routes/devices.js";
import { registerDeviceSettingsRoutes } from "./routes/device-settings.js";
import { registerEffectRoutes } from "./routes/effects.js";

interface BuildServerDeps {
  readonly config: ServerConfig;
  readonly sessions: SessionManager;
  readonly startTime: number;
}

function statusFor(error: Error): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof DeviceNotFoundError) return 404;
  if (error instanceof AuthenticationError) return 401;
  if (error instanceof ProtocolError || error instanceof TransportError) return 502;
  return 500;
}

export async function buildServer(
  deps: BuildServerDeps,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: deps.config.logLevel,
    },
  });

  app.setErrorHandler((error, request, reply) => {
    if (error.validation !== undefined) {
      const body: ErrorResponse = {
        success: false,
        error: error.message,
        code: "VALIDATION_ERROR",
      };
      return reply.status(400).send(body);
    }

    // Fastify's own client errors (bad JSON, unsupported media type) keep their status.
    const { statusCode } = error;
    const clientStatus = isStrandlightError(error) ? undefined : statusCode;
    if (clientStatus !== undefined && clientStatus >= 400 && clientStatus < 500) {
      request.log.warn(error.message);
      const body: ErrorResponse = {
        success: false,
        error: error.message,
        code: "BAD_REQUEST",
      };
      return reply.status(clientStatus).send(body);
    }

    const status = statusFor(error);
    if (status >= 500) {
      request.log.error(error);
    } else {
      request.log.warn(error.message);
    }

    const body: ErrorResponse = {
      success: false,
      error: status === 500 ? "Internal server error" : error.message,
      code: isStrandlightError(error) ? error.code : "INTERNAL_ERROR",
    };
    return reply.status(status).send(body);
  });

  registerHealthRoute(app, {
    sessions: deps.sessions,
    startTime: deps.startTime,
  });

  registerDeviceRoutes(app, {
    sessions: deps.sessions,
  });

  registerDeviceSettingsRoutes(app, {
    sessions: deps.sessions,
  });

  registerEffectRoutes(app, {
    sessions: deps.sessions,
    defaultFrameRate: deps.config.frameRate,
  });

  return app;
}
