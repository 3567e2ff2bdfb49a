import type { FastifyInstance } from "fastify";
import type { DeviceInfo } from "../device/device-info.js";
import { withoutToken } from "../discovery/device-identifier.js";
import type { SessionManager } from "../session/session-manager.js";
import type { DiscoverRequest, DiscoverResponse, MacParams } from "../types/protocol.js";

interface DeviceRouteDeps {
  readonly sessions: SessionManager;
}

export const macParamsSchema = {
  type: "object" as const,
  required: ["mac"],
  properties: {
    mac: { type: "string" as const, pattern: "^[0-9A-Fa-f]{2}(:[0-9A-Fa-f]{2}){5}$" },
  },
};

const discoverSchema = {
  body: {
    type: "object" as const,
    properties: {
      timeoutMs: { type: "integer" as const, minimum: 100, maximum: 60000 },
    },
  },
};

export function registerDeviceRoutes(
  app: FastifyInstance,
  deps: DeviceRouteDeps,
): void {
  app.get("/devices", async () => {
    return deps.sessions.listDevices();
  });

  app.post<{ Body: DiscoverRequest | undefined }>(
    "/devices/discover",
    { schema: discoverSchema },
    async (request): Promise<DiscoverResponse> => {
      const result = await deps.sessions.discover(request.body?.timeoutMs);
      return {
        devices: result.devices.map(withoutToken),
        rediscovered: result.rediscovered.map(withoutToken),
      };
    },
  );

  app.get<{ Params: MacParams }>(
    "/devices/:mac/info",
    { schema: { params: macParamsSchema } },
    async (request): Promise<DeviceInfo> => {
      const session = await deps.sessions.getSession(request.params.mac);
      return session.refreshInfo();
    },
  );

  app.post<{ Params: MacParams }>(
    "/devices/:mac/reauthenticate",
    { schema: { params: macParamsSchema } },
    async (request, reply) => {
      const session = await deps.sessions.getSession(request.params.mac);

      if (!(await session.reauthenticate())) {
        return reply.status(401).send({
          success: false,
          error: `Reauthentication with ${request.params.mac} failed`,
          code: "AUTHENTICATION_ERROR",
        });
      }

      return { success: true };
    },
  );
}
