import { authenticate, type ChallengeSource } from "../auth/auth-session.js";
import type { DeviceClient } from "../device/device-client.js";
import type { Logger } from "../logger.js";
import {
  BROADCAST_ADDRESS,
  DISCOVERY_PORT,
  type DiscoverySocket,
} from "../net/udp-socket.js";
import { formatErrorMessage } from "../errors.js";
import { DISCOVERY_REQUEST, decodeDiscoveryResponse, type DiscoveryResponse } from "./discovery-codec.js";
import { compareDevices, matchesResponse, type DeviceIdentifier } from "./device-identifier.js";

export interface FindDevicesOptions {
  readonly timeoutMs: number;
  /** Devices already known; matches are reported as rediscovered and not re-queried. */
  readonly knownDevices?: readonly DeviceIdentifier[];
  readonly openSocket: () => Promise<DiscoverySocket>;
  readonly createClient: (host: string) => DeviceClient;
  readonly logger: Logger;
  readonly now?: () => number;
  readonly challengeSource?: ChallengeSource;
}

export interface DiscoveryResult {
  readonly devices: readonly DeviceIdentifier[];
  readonly rediscovered: readonly DeviceIdentifier[];
}

async function identify(
  response: DiscoveryResponse,
  options: FindDevicesOptions,
): Promise<DeviceIdentifier> {
  const client = options.createClient(response.ipAddress);
  const info = await client.getGestalt();
  const token = await authenticate(client, info.mac, options.challengeSource);

  return {
    ipAddress: response.ipAddress,
    deviceId: response.deviceId,
    macAddress: info.mac,
    name: info.deviceName,
    ledCount: info.numberOfLed,
    token,
  };
}

/**
 * Broadcasts one discovery request and collects replies until the
 * deadline, which is fixed before the first receive.
 */
export async function findDevices(options: FindDevicesOptions): Promise<DiscoveryResult> {
  const { logger } = options;
  const now = options.now ?? Date.now;
  const known = options.knownDevices ?? [];
  const socket = await options.openSocket();

  const devices: DeviceIdentifier[] = [];
  const rediscovered: DeviceIdentifier[] = [];
  const seen: DiscoveryResponse[] = [];

  try {
    await socket.broadcast(DISCOVERY_REQUEST, DISCOVERY_PORT, BROADCAST_ADDRESS);

    const deadline = now() + options.timeoutMs;

    for (;;) {
      const remaining = deadline - now();
      if (remaining <= 0) {
        break;
      }

      let message: Uint8Array | null;
      try {
        message = await socket.receive(remaining);
      } catch (err: unknown) {
        logger.warn(`Discovery receive failed, ending scan: ${formatErrorMessage(err)}`);
        break;
      }

      if (message === null) {
        break;
      }

      const response = decodeDiscoveryResponse(message);
      if (response === null) {
        continue;
      }

      if (seen.some((r) => r.ipAddress === response.ipAddress && r.deviceId === response.deviceId)) {
        continue;
      }
      seen.push(response);

      const knownMatch = known.find((device) => matchesResponse(device, response));
      if (knownMatch !== undefined) {
        rediscovered.push(knownMatch);
        continue;
      }

      logger.info(`Found device ${response.deviceId} at ${response.ipAddress}`);

      try {
        devices.push(await identify(response, options));
      } catch (err: unknown) {
        logger.warn(
          `Dropping ${response.deviceId} at ${response.ipAddress}: ${formatErrorMessage(err)}`,
        );
      }
    }
  } finally {
    await socket.close();
  }

  return {
    devices: [...devices].sort(compareDevices),
    rediscovered: [...rediscovered].sort(compareDevices),
  };
}
