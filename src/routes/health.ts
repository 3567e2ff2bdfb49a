import type { FastifyInstance } from "fastify";
import type { HealthResponse } from "../types/protocol.js";
import type { SessionManager } from "../session/session-manager.js";

interface HealthDeps {
  readonly sessions: SessionManager;
  readonly startTime: number;
}

export function registerHealthRoute(
  app: FastifyInstance,
  deps: HealthDeps,
): void {
  app.get("/health", async (): Promise<HealthResponse> => {
    return {
      status: "ok",
      knownDevices: deps.sessions.listDevices().length,
      activeAnimations: deps.sessions.activeAnimationCount(),
      uptime: Math.round((Date.now() - deps.startTime) / 1000),
    };
  });
}
