import { createColorModel } from "./color/color-model.js";
import { loadConfig } from "./config/server-config.js";
import { createDeviceClient } from "./device/device-client.js";
import { createDeviceStore } from "./devices/device-store.js";
import { createConsoleLogger } from "./logger.js";
import {
  createMdnsAdvertiser,
  type MdnsAdvertiser,
} from "./mdns/advertiser.js";
import { openDiscoverySocket, openFrameSocket } from "./net/udp-socket.js";
import { buildServer } from "./server.js";
import { createSessionManager } from "./session/session-manager.js";

async function main() {
  const config = loadConfig();
  const startTime = Date.now();
  const consoleLogger = createConsoleLogger();

  const store = createDeviceStore(config.devicesPath, consoleLogger);
  await store.load();

  const sessions = createSessionManager({
    store,
    colorModel: createColorModel({
      gamma: config.gamma,
      colorStyle: config.colorStyle,
      lightnessPolicy: config.lightnessPolicy,
    }),
    logger: consoleLogger,
    createClient: (host) => createDeviceClient({ host }),
    openDiscoverySocket,
    openFrameSocket,
    rtProtocolVersion: config.rtProtocolVersion,
    frameRate: config.frameRate,
    discoveryTimeoutMs: config.discoveryTimeoutMs,
  });

  const app = await buildServer({ config, sessions, startTime });

  let mdnsAdvertiser: MdnsAdvertiser | undefined;
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    app.log.info(`Received ${signal}, shutting down...`);
    mdnsAdvertiser?.unpublishAll();
    await sessions.closeAll();
    await app.close();
    process.exit(0);
  };

  const shutdownOnSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      process.stderr.write(`[Strandlight] Shutdown failed: ${String(err)}\n`);
      process.exit(1);
    });
  };

  process.on("SIGINT", () => shutdownOnSignal("SIGINT"));
  process.on("SIGTERM", () => shutdownOnSignal("SIGTERM"));
  process.on("SIGHUP", () => shutdownOnSignal("SIGHUP"));

  process.on("uncaughtException", (err) => {
    process.stderr.write(`[Strandlight] FATAL uncaughtException: ${err.stack ?? err.message}\n`);
    shutdownOnSignal("uncaughtException");
  });

  process.on("unhandledRejection", (reason) => {
    process.stderr.write(`[Strandlight] FATAL unhandledRejection: ${String(reason)}\n`);
    shutdownOnSignal("unhandledRejection");
  });

  const boundPort = await listenWithRetry(app, config);

  if (config.mdnsEnabled) {
    mdnsAdvertiser = createMdnsAdvertiser(boundPort);
    app.log.info(`mDNS: advertising _strandlight._tcp on port ${boundPort}`);
  }

  app.log.info(`Strandlight server running on ${config.host}:${boundPort}`);
  app.log.info(`Known devices: ${store.getAll().length}`);
  app.log.info(`Real-time protocol: v${config.rtProtocolVersion} at ${config.frameRate} fps`);
}

async function listenWithRetry(
  app: { listen: (opts: { port: number; host: string }) => Promise<string> },
  config: { port: number; host: string; portRangeSize: number },
): Promise<number> {
  const maxPort = config.port + config.portRangeSize;

  for (let port = config.port; port < maxPort; port++) {
    try {
      await app.listen({ port, host: config.host });
      return port;
    } catch (err: unknown) {
      const isAddressInUse =
        err instanceof Error && "code" in err && err.code === "EADDRINUSE";

      if (!isAddressInUse || port === maxPort - 1) {
        throw err;
      }
    }
  }

  throw new Error(
    `All ports in range ${config.port}-${maxPort - 1} are in use`,
  );
}

main().catch((err: unknown) => {
  process.stderr.write(`Failed to start Strandlight server: ${String(err)}\n`);
  process.exit(1);
});
