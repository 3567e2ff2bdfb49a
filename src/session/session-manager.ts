import { createAuthSession, type ChallengeSource } from "../auth/auth-session.js";
import type { ColorModel } from "../color/color-model.js";
import type { DeviceClient } from "../device/device-client.js";
import type { DeviceStore } from "../devices/device-store.js";
import type { DeviceIdentifier } from "../discovery/device-identifier.js";
import { findDevices, type DiscoveryResult } from "../discovery/discovery.js";
import { DeviceNotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import { REALTIME_PORT, type DiscoverySocket, type FrameSocket } from "../net/udp-socket.js";
import type { RandomSource } from "../random.js";
import type { RtProtocolVersion } from "../realtime/frame-codec.js";
import type { SleepFn } from "./animation-loop.js";
import { createDeviceSession, type DeviceSession } from "./device-session.js";

export interface SessionManager {
  readonly listDevices: () => readonly DeviceIdentifier[];
  readonly discover: (timeoutMs?: number) => Promise<DiscoveryResult>;
  readonly getSession: (mac: string) => Promise<DeviceSession>;
  readonly activeAnimationCount: () => number;
  readonly closeAll: () => Promise<void>;
}

export interface SessionManagerOptions {
  readonly store: DeviceStore;
  readonly colorModel: ColorModel;
  readonly logger: Logger;
  readonly createClient: (host: string) => DeviceClient;
  readonly openDiscoverySocket: () => Promise<DiscoverySocket>;
  readonly openFrameSocket: (host: string, port: number) => Promise<FrameSocket>;
  readonly rtProtocolVersion: RtProtocolVersion;
  readonly frameRate: number;
  readonly discoveryTimeoutMs: number;
  readonly random?: RandomSource;
  readonly now?: () => number;
  readonly sleep?: SleepFn;
  readonly challengeSource?: ChallengeSource;
}

const macKey = (mac: string) => mac.toLowerCase();

export function createSessionManager(options: SessionManagerOptions): SessionManager {
  const { store, logger } = options;
  /** Tokens live in memory only; the store never sees them. */
  const tokens = new Map<string, string>();
  const sessions = new Map<string, DeviceSession>();
  const pending = new Map<string, Promise<DeviceSession>>();

  async function openSession(device: DeviceIdentifier): Promise<DeviceSession> {
    const client = options.createClient(device.ipAddress);
    const auth = createAuthSession({
      client,
      mac: device.macAddress,
      token: tokens.get(macKey(device.macAddress)) ?? device.token,
      logger,
      challengeSource: options.challengeSource,
    });

    if (auth.getToken() === null) {
      await auth.authenticate();
    }

    const info = await client.getGestalt(auth.getToken() ?? undefined);
    const socket = await options.openFrameSocket(device.ipAddress, REALTIME_PORT);

    logger.info(`Opened session for ${device.name} (${device.macAddress}) at ${device.ipAddress}`);

    return createDeviceSession({
      device,
      info,
      client,
      auth,
      socket,
      colorModel: options.colorModel,
      version: options.rtProtocolVersion,
      frameRate: options.frameRate,
      logger,
      random: options.random,
      now: options.now,
      sleep: options.sleep,
    });
  }

  return {
    listDevices: () => store.getAll(),

    async discover(timeoutMs = options.discoveryTimeoutMs): Promise<DiscoveryResult> {
      const result = await findDevices({
        timeoutMs,
        knownDevices: store.getAll(),
        openSocket: options.openDiscoverySocket,
        createClient: options.createClient,
        logger,
        now: options.now,
        challengeSource: options.challengeSource,
      });

      for (const device of result.devices) {
        const key = macKey(device.macAddress);
        if (device.token !== undefined) {
          tokens.set(key, device.token);
        }
        store.upsert(device);

        const stale = sessions.get(key);
        if (stale !== undefined && stale.device.ipAddress !== device.ipAddress) {
          sessions.delete(key);
          logger.info(`${device.macAddress} moved to ${device.ipAddress}, closing old session`);
          await stale.close();
        }
      }
      if (result.devices.length > 0) {
        await store.save();
      }

      logger.info(
        `Discovery found ${result.devices.length} new and ${result.rediscovered.length} known devices`,
      );
      return result;
    },

    async getSession(mac: string): Promise<DeviceSession> {
      const key = macKey(mac);
      const existing = sessions.get(key);
      if (existing !== undefined) {
        return existing;
      }

      const inFlight = pending.get(key);
      if (inFlight !== undefined) {
        return inFlight;
      }

      const device = store.getByMac(mac);
      if (device === undefined) {
        throw new DeviceNotFoundError(mac);
      }

      const opening = openSession(device)
        .then((session) => {
          sessions.set(key, session);
          return session;
        })
        .finally(() => {
          pending.delete(key);
        });
      pending.set(key, opening);
      return opening;
    },

    activeAnimationCount: () =>
      [...sessions.values()].filter((session) => session.currentAnimation() !== null).length,

    async closeAll(): Promise<void> {
      const open = [...sessions.values()];
      sessions.clear();
      await Promise.all(open.map((session) => session.close()));
    },
  };
}
